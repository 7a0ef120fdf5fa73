import { describe, it, expect } from 'vitest';
import { ObjectIdGenerator } from '../id';

describe('ObjectIdGenerator', () => {
  it('generates unique 24-character hex IDs', () => {
    const gen = new ObjectIdGenerator();
    const ids = new Set<string>();
    for (let i = 0; i < 1000; i++) {
      const id = gen.generate();
      expect(ObjectIdGenerator.isValid(id)).toBe(true);
      ids.add(id);
    }
    expect(ids.size).toBe(1000);
  });

  it('lays out timestamp, process bytes and counter', () => {
    const gen = new ObjectIdGenerator({
      processUnique: Buffer.from([0x01, 0x02, 0x03, 0x04, 0x05]),
      counterStart: 10,
    });

    const id = gen.generate(new Date('2026-01-01T00:00:00Z'));
    expect(id).toBe('6955b900' + '0102030405' + '00000a');
  });

  it('wraps the counter after 0xffffff', () => {
    const gen = new ObjectIdGenerator({ counterStart: 0xffffff });
    const now = new Date('2026-01-01T00:00:00Z');

    expect(gen.generate(now).slice(18)).toBe('ffffff');
    expect(gen.generate(now).slice(18)).toBe('000000');
  });

  it('parses an ID back to components', () => {
    const gen = new ObjectIdGenerator({ counterStart: 42 });
    const id = gen.generate(new Date('2026-03-01T12:00:30.900Z'));
    const parsed = ObjectIdGenerator.parse(id);

    expect(parsed.timestamp.toISOString()).toBe('2026-03-01T12:00:30.000Z');
    expect(parsed.counter).toBe(42);
  });

  it('rejects malformed IDs', () => {
    expect(ObjectIdGenerator.isValid('not-an-id')).toBe(false);
    expect(ObjectIdGenerator.isValid('ABCDEF0123456789ABCDEF01')).toBe(false);
    expect(() => ObjectIdGenerator.parse('xyz')).toThrow('Invalid object id');
  });

  it('rejects invalid constructor options', () => {
    expect(() => new ObjectIdGenerator({ processUnique: Buffer.alloc(4) })).toThrow();
    expect(() => new ObjectIdGenerator({ counterStart: -1 })).toThrow();
    expect(() => new ObjectIdGenerator({ counterStart: 0x1000000 })).toThrow();
  });
});
