import { ConfigService } from '@nestjs/config';
import { EmailNotificationService } from './email-notification.service';

const payload = { childName: 'Ana', previewUrl: 'https://books.test/#/preview/p-1' };

describe('EmailNotificationService', () => {
  afterEach(() => jest.restoreAllMocks());

  it('returns false without calling out when no api key is configured', async () => {
    const fetchMock = jest.spyOn(global, 'fetch');
    const service = new EmailNotificationService(new ConfigService({ email: {} }));

    await expect(service.send('parent@example.com', 'preview_ready', payload)).resolves.toBe(false);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('posts a rendered email to the provider', async () => {
    const fetchMock = jest
      .spyOn(global, 'fetch')
      .mockResolvedValue(new Response('{"id":"e-1"}', { status: 200 }));
    const service = new EmailNotificationService(
      new ConfigService({ email: { resendApiKey: 'test-secret', fromAddress: 'Books <b@example.com>' } }),
    );

    await expect(service.send('parent@example.com', 'preview_ready', payload)).resolves.toBe(true);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.resend.com/emails');
    const body = JSON.parse(String(init?.body));
    expect(body).toMatchObject({
      from: 'Books <b@example.com>',
      to: ['parent@example.com'],
      subject: "Ana's storybook preview is ready",
    });
    expect(body.html).toContain('href="https://books.test/#/preview/p-1"');
  });

  it('swallows provider errors into false', async () => {
    jest.spyOn(global, 'fetch').mockRejectedValue(new Error('socket hang up'));
    const service = new EmailNotificationService(
      new ConfigService({ email: { resendApiKey: 'test-secret' } }),
    );

    await expect(
      service.send('parent@example.com', 'book_ready', {
        childName: 'Ana',
        bookTitle: 'Ana and the Whispering Woods',
        downloadUrl: 'https://books.test/download/o-1',
      }),
    ).resolves.toBe(false);
  });
});
