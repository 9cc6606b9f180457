/**
 * Pager reply handler tests
 */
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { TelegramError } from 'telegraf';
import { PagerReplyHandler, packLines, splitMessageText } from '../handlers/pagerReply.js';
import { PostgresMappingStore } from '../services/mappingStore.js';
import { BadRequestError, ChatDeliveryError, UnauthorizedError } from '../utils/errorHandler.js';
import { InMemoryMappingDatabase, RecordingChatSender } from './helpers/fakes.js';

vi.mock('@wgtechlabs/log-engine', () => ({
  LogEngine: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn()
  }
}));

describe('splitMessageText', () => {
  it('should leave short text whole', () => {
    expect(splitMessageText('hi there')).toEqual(['hi there']);
  });

  it('should split long text into consecutive chunks', () => {
    const text = 'a'.repeat(4096) + 'b'.repeat(10);
    expect(splitMessageText(text)).toEqual(['a'.repeat(4096), 'b'.repeat(10)]);
  });

  it('should not split a surrogate pair', () => {
    expect(splitMessageText('ab😀cd', 3)).toEqual(['ab', '😀c', 'd']);
  });
});

describe('packLines', () => {
  it('should join lines that fit into one message', () => {
    expect(packLines(['ab', 'cd'], 5)).toEqual(['ab\ncd']);
  });

  it('should break between lines once the limit is reached', () => {
    expect(packLines(['ab', 'cd', 'ef'], 6)).toEqual(['ab\ncd', 'ef']);
  });

  it('should split a line longer than the limit on its own', () => {
    expect(packLines(['ab', 'cdefgh'], 4)).toEqual(['ab', 'cdef', 'gh']);
  });

  it('should return nothing for no lines', () => {
    expect(packLines([])).toEqual([]);
  });
});

describe('PagerReplyHandler', () => {
  let db: InMemoryMappingDatabase;
  let store: PostgresMappingStore;
  let sender: RecordingChatSender;
  let handler: PagerReplyHandler;

  beforeEach(async () => {
    db = new InMemoryMappingDatabase();
    store = new PostgresMappingStore(db);
    sender = new RecordingChatSender(101);
    handler = new PagerReplyHandler(store, sender, 'test-secret');
    await store.upsert('tg_user:42', 42);
    db.statements.length = 0;
  });

  describe('authenticate', () => {
    it('should accept the configured channel key', () => {
      expect(() => handler.authenticate('test-secret')).not.toThrow();
    });

    it('should reject a wrong or missing key', () => {
      expect(() => handler.authenticate('wrong-secret')).toThrow(UnauthorizedError);
      expect(() => handler.authenticate(undefined)).toThrow('bad x-channel-key');
      expect(db.statements).toHaveLength(0);
    });
  });

  it('should deliver the reply text to the mapped chat', async () => {
    const response = await handler.handle({
      event: 'message.created',
      client: { externalId: 'tg_user:42' },
      message: { text: 'hi there', attachments: [] }
    });

    expect(sender.sent).toEqual([{ chatId: 42, text: 'hi there' }]);
    expect(response).toEqual({ externalMessageId: 'bot:42:101' });
  });

  it('should send the trimmed text', async () => {
    await handler.handle({
      event: 'message.created',
      client: { externalId: 'tg_user:42' },
      message: { text: '  hi there \n' }
    });

    expect(sender.sent).toEqual([{ chatId: 42, text: 'hi there' }]);
  });

  it('should send attachment URLs as one message after the text', async () => {
    const response = await handler.handle({
      event: 'message.created',
      client: { externalId: 'tg_user:42' },
      message: {
        text: 'see files',
        attachments: [
          { type: 'file', payload: { url: 'https://files.example.test/a.pdf' } },
          { type: 'file', payload: {} },
          'garbage',
          { type: 'image', payload: { url: 'https://files.example.test/b.png' } }
        ]
      }
    });

    expect(sender.sent).toEqual([
      { chatId: 42, text: 'see files' },
      { chatId: 42, text: 'https://files.example.test/a.pdf\nhttps://files.example.test/b.png' }
    ]);
    expect(response).toEqual({ externalMessageId: 'bot:42:102' });
  });

  it('should send only the URLs when the text is empty', async () => {
    const response = await handler.handle({
      event: 'message.created',
      client: { externalId: 'tg_user:42' },
      message: {
        text: '',
        attachments: [{ type: 'file', payload: { url: 'https://files.example.test/a.pdf' } }]
      }
    });

    expect(sender.sent).toEqual([{ chatId: 42, text: 'https://files.example.test/a.pdf' }]);
    expect(response).toEqual({ externalMessageId: 'bot:42:101' });
  });

  it('should read at most 20 attachment entries', async () => {
    const attachments = Array.from({ length: 25 }, (_, index) => ({
      payload: { url: `https://files.example.test/${index}` }
    }));

    await handler.handle({
      event: 'message.created',
      client: { externalId: 'tg_user:42' },
      message: { attachments }
    });

    expect(sender.sent[0]?.text.split('\n')).toHaveLength(20);
    expect(sender.sent[0]?.text.split('\n')[19]).toBe('https://files.example.test/19');
  });

  it('should split a long attachment list between URLs', async () => {
    const attachments = Array.from({ length: 20 }, (_, index) => ({
      payload: { url: `https://files.example.test/${String(index).padStart(2, '0')}?sig=${'a'.repeat(366)}` }
    }));

    const response = await handler.handle({
      event: 'message.created',
      client: { externalId: 'tg_user:42' },
      message: { text: 'see files', attachments }
    });

    expect(sender.sent.map((sent) => sent.text.length)).toEqual([9, 4009, 4009]);
    expect(sender.sent[1]?.text.split('\n')).toHaveLength(10);
    expect(sender.sent[2]?.text.split('\n')[9]).toBe(attachments[19]?.payload.url);
    expect(response).toEqual({ externalMessageId: 'bot:42:103' });
  });

  it('should answer with the pager message id when nothing is sent', async () => {
    expect(await handler.handle({
      event: 'message.created',
      client: { externalId: 'tg_user:42' },
      message: { text: '   ', attachments: [], pagerMessageId: 'p1' }
    })).toEqual({ externalMessageId: 'pager:p1' });

    expect(await handler.handle({
      event: 'message.created',
      client: { externalId: 'tg_user:42' },
      message: { text: '' }
    })).toEqual({ externalMessageId: 'pager:' });

    expect(sender.sent).toHaveLength(0);
  });

  it('should split long replies and report the last chunk', async () => {
    const response = await handler.handle({
      event: 'message.created',
      client: { externalId: 'tg_user:42' },
      message: { text: 'x'.repeat(5000) }
    });

    expect(sender.sent.map((sent) => sent.text.length)).toEqual([4096, 904]);
    expect(response).toEqual({ externalMessageId: 'bot:42:102' });
  });

  it('should ignore other event types without sending', async () => {
    const response = await handler.handle({
      event: 'conversation.closed',
      client: { externalId: 'tg_user:42' },
      message: { text: 'bye' }
    });

    expect(response).toEqual({ externalMessageId: 'ignored' });
    expect(sender.sent).toHaveLength(0);
    expect(db.statements).toHaveLength(0);
  });

  it('should reject bodies that are not objects', async () => {
    await expect(handler.handle([1, 2])).rejects.toThrow(BadRequestError);
    await expect(handler.handle('text')).rejects.toThrow('request body must be a JSON object');
  });

  it('should reject a missing client id', async () => {
    await expect(handler.handle({
      event: 'message.created',
      client: { externalId: '' },
      message: { text: 'hi' }
    })).rejects.toThrow('missing client.externalId');

    await expect(handler.handle({
      event: 'message.created',
      message: { text: 'hi' }
    })).rejects.toThrow('missing client.externalId');
  });

  it('should reject a client without a mapping and send nothing', async () => {
    await expect(handler.handle({
      event: 'message.created',
      client: { externalId: 'tg_user:404' },
      message: { text: 'hi' }
    })).rejects.toThrow('unknown client.externalId (no mapping yet)');

    expect(sender.sent).toHaveLength(0);
  });

  it('should surface Telegram failures as delivery errors', async () => {
    sender.failWith(new TelegramError({
      error_code: 429,
      description: 'Too Many Requests: retry after 5',
      parameters: { retry_after: 5 }
    }));

    const failure = handler.handle({
      event: 'message.created',
      client: { externalId: 'tg_user:42' },
      message: { text: 'hi' }
    });

    await expect(failure).rejects.toBeInstanceOf(ChatDeliveryError);
    await expect(failure).rejects.toMatchObject({ statusCode: 503, retryAfter: 5 });
  });
});
