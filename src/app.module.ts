import { Module } from '@nestjs/common';

import { ExtractionsModule } from './modules/extractions/extractions.module';

@Module({
  imports: [ExtractionsModule],
})
export class AppModule {}
