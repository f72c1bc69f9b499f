import { Module } from '@nestjs/common';
import { AcquisitionModule } from '../acquisition/acquisition.module';
import { PagesController } from './pages.controller';
import { PagesService } from './pages.service';

@Module({
  imports: [AcquisitionModule],
  controllers: [PagesController],
  providers: [PagesService],
})
export class PagesModule {}
