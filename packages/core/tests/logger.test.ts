import { describe, expect, it } from 'vitest';
import { Logger, redactSecrets } from '../src/index.js';

describe('Logger', () => {
  it('filters below the configured level', () => {
    const lines: string[] = [];
    const logger = new Logger({ level: 'warn', format: 'json', sink: (line) => lines.push(line) });

    logger.info('skipped');
    logger.warn('kept');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({ level: 'warn', msg: 'kept' });
  });

  it('merges child fields into every record', () => {
    const lines: string[] = [];
    const logger = new Logger({ format: 'json', sink: (line) => lines.push(line) });

    logger.child({ family: 'org-units' }).info('hello', { key: 'A' });

    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({ family: 'org-units', key: 'A', msg: 'hello' });
  });

  it('prints the family in text format', () => {
    const lines: string[] = [];
    const logger = new Logger({ sink: (line) => lines.push(line) });

    logger.child({ family: 'legal-references' }).error('failed');

    expect(lines[0]).toMatch(/^\[.+\] ERROR \[legal-references\] failed$/);
  });
});

describe('redactSecrets', () => {
  it('redacts secret keys, bearer tokens and api keys in URLs', () => {
    expect(
      redactSecrets({
        token: 'test-secret',
        header: 'Bearer abcdefghijkl',
        url: 'https://portal.example/api?apikey=test-secret&limit=10',
      })
    ).toEqual({
      token: '[REDACTED]',
      header: 'Bearer [REDACTED]',
      url: 'https://portal.example/api?apikey=[REDACTED]&limit=10',
    });
  });
});
