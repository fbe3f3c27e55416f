import { MessageHandler } from './messageHandler';
import { CommandParser } from '../commands/commandParser';
import { TranslationRelay } from '../services/translationRelay';
import { InboundMessage, FetchOutcome } from '../types/message';

jest.mock('../services/translationRelay');

describe('MessageHandler', () => {
  let handler: MessageHandler;
  let mockRelay: jest.Mocked<TranslationRelay>;
  let fetchReference: jest.Mock<Promise<FetchOutcome>, []>;

  const found: FetchOutcome = {
    status: 'found',
    message: { authorId: 'author-9', content: 'hello' },
  };

  function createMessage(overrides: Partial<InboundMessage> = {}): InboundMessage {
    return {
      id: 'msg-1',
      authorId: 'user-1',
      authorName: 'Tester',
      fromSelf: false,
      guild: { id: '123456789', name: 'Test Guild' },
      content: '/translate fr',
      referencedMessageId: 'orig-1',
      fetchReference,
      ...overrides,
    };
  }

  beforeEach(() => {
    const provider = { name: 'Fake', translate: jest.fn() };
    mockRelay = new TranslationRelay(provider, provider) as jest.Mocked<TranslationRelay>;
    mockRelay.translate.mockResolvedValue('bonjour');

    fetchReference = jest.fn<Promise<FetchOutcome>, []>().mockResolvedValue(found);

    handler = new MessageHandler(
      new CommandParser(),
      mockRelay,
      new Set(['123456789'])
    );
  });

  describe('基本的なフィルタリング', () => {
    it('bot自身のメッセージはコマンドでも無視する', async () => {
      const actions = await handler.handle(createMessage({ fromSelf: true }));

      expect(actions).toEqual([]);
      expect(fetchReference).not.toHaveBeenCalled();
      expect(mockRelay.translate).not.toHaveBeenCalled();
    });

    it('許可されていないサーバーのメッセージは無視する', async () => {
      const actions = await handler.handle(
        createMessage({ guild: { id: '999999999', name: 'Other Guild' } })
      );

      expect(actions).toEqual([]);
      expect(fetchReference).not.toHaveBeenCalled();
      expect(mockRelay.translate).not.toHaveBeenCalled();
    });

    it('許可されていないサーバーではusageも返さない', async () => {
      const actions = await handler.handle(
        createMessage({
          guild: { id: '999999999', name: 'Other Guild' },
          content: '/translate',
        })
      );

      expect(actions).toEqual([]);
    });

    it('DMは許可リストに関係なく翻訳する', async () => {
      const actions = await handler.handle(createMessage({ guild: null }));

      expect(mockRelay.translate).toHaveBeenCalledWith('hello', 'fr');
      expect(actions).toHaveLength(1);
    });

    it('返信でないメッセージは無視する', async () => {
      const actions = await handler.handle(
        createMessage({ referencedMessageId: null })
      );

      expect(actions).toEqual([]);
      expect(fetchReference).not.toHaveBeenCalled();
    });

    it('コマンドでない返信は無視する', async () => {
      const actions = await handler.handle(createMessage({ content: 'thanks!' }));

      expect(actions).toEqual([]);
      expect(fetchReference).not.toHaveBeenCalled();
    });
  });

  describe('コマンドの形式エラー', () => {
    it('言語コードがない場合は使い方を返す', async () => {
      const actions = await handler.handle(createMessage({ content: '/translate' }));

      expect(actions).toEqual([
        {
          type: 'reply',
          content: 'Usage: `/translate <language_code>` when replying to a message.',
        },
      ]);
    });

    it('1文字の言語コードはエラーを返し、翻訳しない', async () => {
      const actions = await handler.handle(createMessage({ content: '/translate f' }));

      expect(actions).toEqual([
        {
          type: 'reply',
          content: 'Invalid language code: `f`. Please use a 2-letter ISO 639-1 code.',
        },
      ]);
      expect(fetchReference).not.toHaveBeenCalled();
      expect(mockRelay.translate).not.toHaveBeenCalled();
    });
  });

  describe('返信元メッセージの取得', () => {
    it('見つからない場合はその旨を返す', async () => {
      fetchReference.mockResolvedValue({ status: 'not_found' });

      const actions = await handler.handle(createMessage());

      expect(actions).toEqual([
        { type: 'reply', content: 'The message you replied to could not be found.' },
      ]);
      expect(mockRelay.translate).not.toHaveBeenCalled();
    });

    it('権限がない場合はその旨を返す', async () => {
      fetchReference.mockResolvedValue({ status: 'forbidden' });

      const actions = await handler.handle(createMessage());

      expect(actions).toEqual([
        {
          type: 'reply',
          content: "I don't have permissions to read the message you replied to.",
        },
      ]);
    });

    it('本文が空の場合はその旨を返す', async () => {
      fetchReference.mockResolvedValue({
        status: 'found',
        message: { authorId: 'author-9', content: '' },
      });

      const actions = await handler.handle(createMessage());

      expect(actions).toEqual([
        {
          type: 'reply',
          content: 'The message you replied to has no text content to translate.',
        },
      ]);
      expect(mockRelay.translate).not.toHaveBeenCalled();
    });
  });

  describe('翻訳の実行', () => {
    it('翻訳結果を元の投稿者へのメンション付きで返す', async () => {
      const actions = await handler.handle(createMessage());

      expect(mockRelay.translate).toHaveBeenCalledWith('hello', 'fr');
      expect(actions).toEqual([
        {
          type: 'reply',
          content: "Translation of <@author-9>'s message to `FR`:",
          quote: 'bonjour',
          mentionUserIds: ['author-9'],
        },
      ]);
    });

    it('大文字のコマンドも小文字のコードで翻訳する', async () => {
      await handler.handle(createMessage({ content: '/TRANSLATE DE' }));

      expect(mockRelay.translate).toHaveBeenCalledWith('hello', 'de');
    });

    it('両方のサービスが失敗した場合はその旨を返す', async () => {
      mockRelay.translate.mockResolvedValue(null);

      const actions = await handler.handle(createMessage({ content: '/translate zz' }));

      expect(actions).toEqual([
        {
          type: 'reply',
          content:
            "Sorry, I couldn't translate that message to `zz`. Both translation services failed or returned no result.",
        },
      ]);
    });
  });

  describe('予期しないエラー', () => {
    it('取得中の例外は内部エラーとして返す', async () => {
      fetchReference.mockRejectedValue(new Error('socket closed'));

      const actions = await handler.handle(createMessage());

      expect(actions).toEqual([
        {
          type: 'reply',
          content: 'An internal error occurred: socket closed. Please try again later.',
        },
      ]);
    });

    it('翻訳中の例外も内部エラーとして返し、外には投げない', async () => {
      mockRelay.translate.mockRejectedValue(new Error('unexpected'));

      await expect(handler.handle(createMessage())).resolves.toEqual([
        {
          type: 'reply',
          content: 'An internal error occurred: unexpected. Please try again later.',
        },
      ]);
    });
  });
});
