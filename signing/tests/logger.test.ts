import { Logger } from '../src/utils/logger';

describe('Logger', () => {
  const originalLevel = process.env.LOG_LEVEL;
  let log: jest.SpyInstance;

  beforeEach(() => {
    process.env.LOG_LEVEL = 'info';
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    log.mockRestore();
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  function lastLine(): Record<string, unknown> {
    const [line] = log.mock.calls[log.mock.calls.length - 1];
    return JSON.parse(String(line));
  }

  test('redacts secret keys by exact name and keeps counters', () => {
    Logger.info('Document sent', {
      documentId: 'doc-1',
      regeneratedTokens: 1,
      accessToken: 'placeholder-token',
      submissionEncryptionKeyId: 'primary',
      row: { access_token: 'placeholder-token', encrypted_value: 'ciphertext', field_name: 'rent' },
    });

    expect(lastLine()).toMatchObject({
      level: 'info',
      message: 'Document sent',
      documentId: 'doc-1',
      regeneratedTokens: 1,
      accessToken: '[REDACTED]',
      submissionEncryptionKeyId: 'primary',
      row: { access_token: '[REDACTED]', encrypted_value: '[REDACTED]', field_name: 'rent' },
    });
  });

  test('flattens errors passed as metadata', () => {
    Logger.info('Sweep failed', new Error('connection reset'));

    expect(lastLine()).toMatchObject({ error: 'connection reset', errorName: 'Error' });
  });

  test('drops lines below the configured level', () => {
    process.env.LOG_LEVEL = 'warn';
    Logger.info('ignored');

    expect(log).not.toHaveBeenCalled();
  });
});
