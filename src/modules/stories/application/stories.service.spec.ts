import { StoriesService } from './stories.service';

describe('StoriesService', () => {
  const service = new StoriesService();

  it('ships complete ten page themes with contiguous page numbers', () => {
    const themes = service.listThemes();
    expect(themes.map((theme) => theme.id)).toEqual(['space-explorer', 'enchanted-forest']);
    for (const theme of themes) {
      expect(theme.pages.map((page) => page.pageNumber)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    }
  });

  it('returns null for an unknown theme', () => {
    expect(service.getTheme('under-the-sea')).toBeNull();
  });

  it('fills the sanitized name into titles and story text', () => {
    const theme = service.getTheme('space-explorer');
    if (!theme) throw new Error('theme missing');

    expect(service.bookTitle(theme, 'Mia<script>')).toBe('Miascript and the Starlight Voyage');
    expect(service.renderStoryText(theme.pages[2], 'Leo')).toBe(
      'Leo climbed aboard, buckled up and pressed the big green button. Whoosh! The rocket zoomed up through the clouds.',
    );
  });

  it('layers subject, appearance, scene and constraint', () => {
    const theme = service.getTheme('enchanted-forest');
    if (!theme) throw new Error('theme missing');

    const prompt = service.buildPagePrompt(theme.pages[0], {
      childName: 'Ana',
      childAge: 6,
      childGender: 'female',
      faceDescription: 'curly brown hair and green eyes',
    });

    expect(prompt.split('\n')).toEqual([
      'Subject: A 6-year-old girl named Ana.',
      'Appearance: curly brown hair and green eyes.',
      '',
      `Scene Action: ${theme.pages[0].scenePrompt}`,
      '',
      'Constraint: keep the identical character face, hair and skin tone from the reference photo. One child only, fully visible, child-friendly and gentle.',
    ]);
  });
});
