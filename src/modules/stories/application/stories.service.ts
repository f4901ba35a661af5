import { Injectable } from '@nestjs/common';
import themesData from '../data/themes.json';
import { fillNameTemplate, sanitizeChildName } from '../../../common/utils/sanitize';
import type { StoryTheme, ThemePage } from '../domain/story-theme';

export interface PromptSubject {
  childName: string;
  childAge: number;
  childGender: 'male' | 'female';
  faceDescription: string;
}

const CONSISTENCY_CONSTRAINT =
  'Constraint: keep the identical character face, hair and skin tone from the reference photo. One child only, fully visible, child-friendly and gentle.';

const THEMES: readonly StoryTheme[] = themesData.themes;

@Injectable()
export class StoriesService {
  private readonly themes = new Map(THEMES.map((theme) => [theme.id, theme]));

  listThemes(): StoryTheme[] {
    return [...this.themes.values()];
  }

  getTheme(themeId: string): StoryTheme | null {
    return this.themes.get(themeId) ?? null;
  }

  bookTitle(theme: StoryTheme, childName: string): string {
    return fillNameTemplate(theme.title, childName);
  }

  renderStoryText(page: ThemePage, childName: string): string {
    return fillNameTemplate(page.storyText, childName);
  }

  buildPagePrompt(page: ThemePage, subject: PromptSubject): string {
    return this.layeredPrompt(page.scenePrompt, subject);
  }

  buildCoverPrompt(theme: StoryTheme, subject: PromptSubject): string {
    return this.layeredPrompt(theme.coverPrompt, subject);
  }

  private layeredPrompt(scene: string, subject: PromptSubject): string {
    const name = sanitizeChildName(subject.childName);
    const noun = subject.childGender === 'female' ? 'girl' : 'boy';

    return [
      `Subject: A ${subject.childAge}-year-old ${noun} named ${name}.`,
      `Appearance: ${subject.faceDescription}.`,
      '',
      `Scene Action: ${fillNameTemplate(scene, name)}`,
      '',
      CONSISTENCY_CONSTRAINT,
    ].join('\n');
  }
}
