import { fillNameTemplate, sanitizeChildName } from './sanitize';

describe('sanitizeChildName', () => {
  it('keeps letters, spaces, hyphens and apostrophes', () => {
    expect(sanitizeChildName("  Mary-Jane   O'Neil ")).toBe("Mary-Jane O'Neil");
  });

  it('strips digits and markup', () => {
    expect(sanitizeChildName('Tom123 <b>')).toBe('Tom b');
  });

  it('caps the length at thirty characters', () => {
    expect(sanitizeChildName('A'.repeat(40))).toBe('A'.repeat(30));
  });

  it('defaults when nothing usable remains', () => {
    expect(sanitizeChildName('1234')).toBe('Child');
    expect(sanitizeChildName(null)).toBe('Child');
  });
});

describe('fillNameTemplate', () => {
  it('replaces every placeholder', () => {
    expect(fillNameTemplate('{name} waved. Bye, {name}!', 'Zoe')).toBe('Zoe waved. Bye, Zoe!');
  });
});
