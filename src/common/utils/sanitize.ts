const MAX_CHILD_NAME_LENGTH = 30;
const DEFAULT_CHILD_NAME = 'Child';

/**
 * Reduce a child's name to letters, spaces, hyphens and apostrophes so it can
 * be embedded in prompts and rendered on book pages.
 */
export function sanitizeChildName(name: string | null | undefined): string {
  if (!name) return DEFAULT_CHILD_NAME;

  const cleaned = name
    .replace(/[^a-zA-Z\s\-']/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .slice(0, MAX_CHILD_NAME_LENGTH)
    .trim();

  return cleaned || DEFAULT_CHILD_NAME;
}

/** Replace every `{name}` placeholder with the sanitized child name. */
export function fillNameTemplate(template: string, childName: string): string {
  return template.split('{name}').join(sanitizeChildName(childName));
}
