import { sanitizeChildName } from '../../../common/utils/sanitize';
import type { NotificationKind, NotificationPayloads } from './notification-dispatcher.interface';

export interface RenderedEmail {
  subject: string;
  html: string;
}

const escapeHtml = (value: string) =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');

const layout = (heading: string, body: string, cta: { label: string; url: string }) => `
<!doctype html>
<html>
  <body style="font-family: Georgia, serif; background: #fdf8f0; padding: 32px;">
    <div style="max-width: 560px; margin: 0 auto; background: #ffffff; border-radius: 12px; padding: 32px;">
      <h1 style="color: #4a3b8f;">${heading}</h1>
      <p style="font-size: 16px; line-height: 1.6; color: #333333;">${body}</p>
      <p style="text-align: center; margin-top: 32px;">
        <a href="${escapeHtml(cta.url)}" style="background: #4a3b8f; color: #ffffff; padding: 14px 28px; border-radius: 24px; text-decoration: none;">${cta.label}</a>
      </p>
    </div>
  </body>
</html>`;

type TemplateMap = {
  [K in NotificationKind]: (payload: NotificationPayloads[K]) => RenderedEmail;
};

export const EMAIL_TEMPLATES: TemplateMap = {
  preview_ready: ({ childName, previewUrl }) => {
    const name = escapeHtml(sanitizeChildName(childName));
    return {
      subject: `${sanitizeChildName(childName)}'s storybook preview is ready`,
      html: layout(
        `${name}'s story is ready to peek at!`,
        `We've illustrated the first pages of ${name}'s personalized storybook. Take a look and unlock the rest of the adventure.`,
        { label: 'See the preview', url: previewUrl },
      ),
    };
  },
  book_ready: ({ childName, bookTitle, downloadUrl }) => {
    const name = escapeHtml(sanitizeChildName(childName));
    return {
      subject: `"${bookTitle}" is ready to download`,
      html: layout(
        `${name}'s book is complete`,
        `Every page of <em>${escapeHtml(bookTitle)}</em> has been illustrated. Your download link stays active for 30 days.`,
        { label: 'Download the book', url: downloadUrl },
      ),
    };
  },
};

export function renderEmail<K extends NotificationKind>(
  kind: K,
  payload: NotificationPayloads[K],
): RenderedEmail {
  const template: (payload: NotificationPayloads[K]) => RenderedEmail = EMAIL_TEMPLATES[kind];
  return template(payload);
}
