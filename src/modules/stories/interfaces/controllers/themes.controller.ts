import { Controller, Get } from '@nestjs/common';
import { StoriesService } from '../../application/stories.service';

@Controller('themes')
export class ThemesController {
  constructor(private readonly storiesService: StoriesService) {}

  @Get()
  list() {
    return this.storiesService.listThemes().map((theme) => ({
      id: theme.id,
      title: theme.title,
      description: theme.description,
      pageCount: theme.pages.length,
    }));
  }
}
