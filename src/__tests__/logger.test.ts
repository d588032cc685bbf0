import { describe, it, expect } from 'vitest';
import { consoleFormat } from '../utils/logger.js';

const MESSAGE = Symbol.for('message');

describe('consoleFormat', () => {
  it('writes one plain JSON line without colour codes', () => {
    const info = consoleFormat('registry').transform({
      level: 'info',
      message: 'Participant signed up',
      timestamp: '2026-01-05 15:30:00.000',
      tags: ['registry', 'signup'],
      activityName: 'Chess Club'
    });

    expect(info).not.toBe(false);
    const line = typeof info === 'object' ? info[MESSAGE] : undefined;
    expect(line).toBe(
      '{"timestamp":"2026-01-05 15:30:00.000","service":"registry","level":"info","tags":["registry","signup"],"message":"Participant signed up","data":{"activityName":"Chess Club"}}'
    );
  });

  it('wraps a single tag in a list', () => {
    const info = consoleFormat('server').transform({ level: 'warn', message: 'hi', timestamp: 't', tags: 'access' });
    const line = typeof info === 'object' ? info[MESSAGE] : undefined;
    expect(line).toBe('{"timestamp":"t","service":"server","level":"warn","tags":["access"],"message":"hi","data":{}}');
  });
});
