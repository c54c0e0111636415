import { DeliveryError } from '../../core/errors';
import { TelegramService } from '../../notify/TelegramService';
import { createTestClient, httpResponse, testLogger } from '../helpers/http';
import { makeListing } from '../helpers/listings';

const TOKEN = '123456:test-secret';

function createService(overrides: { maxRetries?: number } = {}, disableWebPagePreview = false) {
  const { client, transport } = createTestClient('telegram', overrides);
  const service = new TelegramService(client, { botToken: TOKEN, chatId: '42', minIntervalMs: 0, disableWebPagePreview }, testLogger());
  return { service, transport };
}

describe('TelegramService', () => {
  it('posts the formatted listing and returns the message id', async () => {
    const { service, transport } = createService();
    transport.request.mockResolvedValueOnce(httpResponse(200, { ok: true, result: { message_id: 77 } }));
    const listing = makeListing('a', { title: 'PS4 *mint*', price: '900 грн.', url: 'https://www.olx.ua/d/a.html' });

    const event = await service.notify(listing);

    expect(event.messageId).toBe(77);
    expect(event.channel).toBe('telegram');
    expect(transport.request).toHaveBeenCalledWith(expect.objectContaining({
      url: 'https://api.telegram.org/bot123456:test-secret/sendMessage',
      method: 'POST',
      data: {
        chat_id: '42',
        text: '📢 *PS4 \\*mint\\**\n💰 900 грн.\n🔗 https://www.olx.ua/d/a.html',
        disable_web_page_preview: false,
        parse_mode: 'Markdown'
      }
    }));
    expect(service.getStatus().sent).toBe(1);
  });

  it('sends plain text without a parse mode', async () => {
    const { service, transport } = createService();
    transport.request.mockResolvedValueOnce(httpResponse(200, { ok: true, result: { message_id: 1 } }));

    await service.sendText('hello_world');

    expect(transport.request).toHaveBeenCalledWith(expect.objectContaining({
      data: { chat_id: '42', text: 'hello_world', disable_web_page_preview: false }
    }));
  });

  it('turns link previews off when configured', async () => {
    const { service, transport } = createService({}, true);
    transport.request.mockResolvedValueOnce(httpResponse(200, { ok: true, result: { message_id: 2 } }));

    await service.sendText('no preview');

    expect(transport.request).toHaveBeenCalledWith(expect.objectContaining({
      data: { chat_id: '42', text: 'no preview', disable_web_page_preview: true }
    }));
  });

  it('reports 403 with a hint about the chat', async () => {
    const { service, transport } = createService();
    transport.request.mockResolvedValueOnce(
      httpResponse(403, { ok: false, error_code: 403, description: 'Forbidden: bot was blocked by the user' })
    );

    const error = await service.notify(makeListing('a')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeliveryError);
    expect(error).toMatchObject({ status: 403 });
    expect(error instanceof Error && error.message).toContain("The chat hasn't started the bot");
    expect(error instanceof Error && error.message).toContain('Response: Forbidden: bot was blocked by the user');
    expect(service.getStatus().failed).toBe(1);
  });

  it('reports 404 as a bad token or endpoint', async () => {
    const { service, transport } = createService();
    transport.request.mockResolvedValueOnce(httpResponse(404, { ok: false, description: 'Not Found' }));

    await expect(service.notify(makeListing('a'))).rejects.toThrow(
      'Telegram send failed (404 Not Found). Check the bot token and API URL. Response: Not Found'
    );
  });

  it('rejects a 200 whose envelope is not ok', async () => {
    const { service, transport } = createService();
    transport.request.mockResolvedValueOnce(httpResponse(200, { ok: false, description: 'chat not found' }));

    await expect(service.notify(makeListing('a'))).rejects.toThrow('Telegram API error: chat not found');
  });

  it('waits out a 429 and succeeds on retry', async () => {
    const { service, transport } = createService();
    transport.request
      .mockResolvedValueOnce(httpResponse(429, { ok: false, description: 'Too Many Requests', parameters: { retry_after: 0 } }))
      .mockResolvedValueOnce(httpResponse(200, { ok: true, result: { message_id: 5 } }));

    const event = await service.notify(makeListing('a'));

    expect(event.messageId).toBe(5);
    expect(transport.request).toHaveBeenCalledTimes(2);
  });

  it('wraps network failures once retries are exhausted', async () => {
    const { service, transport } = createService({ maxRetries: 1 });
    transport.request.mockRejectedValue(new Error('ECONNRESET'));

    await expect(service.notify(makeListing('a'))).rejects.toThrow('Telegram send exception: ECONNRESET');
    expect(transport.request).toHaveBeenCalledTimes(2);
  });

  it('reads the bot identity from getMe', async () => {
    const { service, transport } = createService();
    transport.request.mockResolvedValueOnce(
      httpResponse(200, { ok: true, result: { id: 123456, is_bot: true, first_name: 'Watcher', username: 'olx_watch_bot' } })
    );

    await expect(service.getMe()).resolves.toEqual({
      id: 123456,
      isBot: true,
      firstName: 'Watcher',
      username: 'olx_watch_bot'
    });
    expect(transport.request).toHaveBeenCalledWith(expect.objectContaining({
      url: 'https://api.telegram.org/bot123456:test-secret/getMe',
      method: 'GET'
    }));
  });
});
