import { Module } from '@nestjs/common';
import { StoriesService } from './application/stories.service';
import { ThemesController } from './interfaces/controllers/themes.controller';

@Module({
  controllers: [ThemesController],
  providers: [StoriesService],
  exports: [StoriesService],
})
export class StoriesModule {}
