export interface ThemePage {
  pageNumber: number;
  storyText: string;
  scenePrompt: string;
}

export interface StoryTheme {
  id: string;
  /** Title template; `{name}` is replaced with the child's name. */
  title: string;
  description: string;
  coverPrompt: string;
  pages: ThemePage[];
}
