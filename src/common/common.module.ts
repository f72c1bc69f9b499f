import { Global, Module } from '@nestjs/common';
import { CLOCK, SystemClock } from './utility/clock';
import { MathRandomSource, RANDOM_SOURCE } from './utility/random';

@Global()
@Module({
  providers: [
    { provide: CLOCK, useClass: SystemClock },
    { provide: RANDOM_SOURCE, useClass: MathRandomSource },
  ],
  exports: [CLOCK, RANDOM_SOURCE],
})
export class CommonModule {}
