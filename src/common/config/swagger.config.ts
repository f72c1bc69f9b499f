import { DocumentBuilder } from '@nestjs/swagger';

export const swaggerConfig = new DocumentBuilder()
  .setTitle('Page Insights API')
  .setDescription(
    'Acquires organization profile pages (live, or synthesized when the live source is unavailable), ' +
      'stores their posts, followers and employees, and serves paginated views plus engagement analytics ' +
      'with an optional AI-written summary.',
  )
  .setVersion('1.0.0')
  .build();
