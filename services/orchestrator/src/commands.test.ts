import { describe, expect, it } from 'vitest';
import { buildCommand, resolveKind, tokenize } from './commands';

const META = { issuerId: 7, chatId: -100, timestamp: 1_000 };

describe('tokenize', () => {
  it('splits the command name from its arguments', () => {
    expect(tokenize('/bs sol/usdt:usdt, doge/usdt:usdt')).toEqual({
      name: 'bs',
      args: ['sol/usdt:usdt', 'doge/usdt:usdt']
    });
  });

  it('drops a bot-name suffix and lower-cases the name', () => {
    expect(tokenize('/Go_Long@pilot_bot 250')).toEqual({ name: 'go_long', args: ['250'] });
  });

  it('ignores plain text', () => {
    expect(tokenize('hello there')).toBeNull();
    expect(tokenize('/')).toBeNull();
  });
});

describe('resolveKind', () => {
  it('maps aliases onto command kinds', () => {
    expect(resolveKind('basket')).toBe('show_basket');
    expect(resolveKind('bs')).toBe('set_basket');
    expect(resolveKind('basket_set')).toBe('set_basket');
    expect(resolveKind('stake')).toBe('set_stake');
  });

  it('rejects unknown commands', () => {
    expect(() => resolveKind('moon')).toThrow('unknown command /moon; see /help');
    expect(() => resolveKind('constructor')).toThrow(/unknown command/);
  });
});

describe('buildCommand', () => {
  it('normalizes basket pairs', () => {
    const command = buildCommand('set_basket', ['sol/usdt:usdt', 'SOL/USDT:USDT', 'doge/usdt:usdt'], META);
    expect(command).toEqual({
      kind: 'set_basket',
      pairs: ['SOL/USDT:USDT', 'DOGE/USDT:USDT'],
      meta: { ...META, rawArgs: ['sol/usdt:usdt', 'SOL/USDT:USDT', 'doge/usdt:usdt'] }
    });
    expect(Object.isFrozen(command)).toBe(true);
    expect(Object.isFrozen(command.meta)).toBe(true);
  });

  it('rejects a malformed pair and an empty pair list', () => {
    expect(() => buildCommand('set_basket', ['BTCUSDT'], META)).toThrow('invalid pair "BTCUSDT", expected BASE/QUOTE:SETTLE');
    expect(() => buildCommand('set_basket', [], META)).toThrow(/at least one pair/);
  });

  it('parses stake amounts', () => {
    expect(buildCommand('set_stake', ['500'], META)).toMatchObject({ kind: 'set_stake', amount: 500 });
    expect(() => buildCommand('set_stake', ['abc'], META)).toThrow('stake must be a positive number, got "abc"');
    expect(() => buildCommand('set_stake', ['-5'], META)).toThrow(/positive number/);
    expect(() => buildCommand('set_stake', ['0'], META)).toThrow(/positive number/);
    expect(() => buildCommand('set_stake', [], META)).toThrow(/exactly one amount/);
  });

  it('takes an optional amount on entries', () => {
    expect(buildCommand('go_long', [], META)).toMatchObject({ kind: 'go_long' });
    expect(buildCommand('go_long', [], META)).not.toHaveProperty('stake');
    expect(buildCommand('go_short', ['75.5'], META)).toMatchObject({ kind: 'go_short', stake: 75.5 });
    expect(() => buildCommand('go_short', ['1', '2'], META)).toThrow(/at most one amount/);
  });

  it('parses the auto mode, defaulting to status', () => {
    expect(buildCommand('auto', [], META)).toMatchObject({ mode: 'status' });
    expect(buildCommand('auto', ['ON'], META)).toMatchObject({ mode: 'on' });
    expect(() => buildCommand('auto', ['maybe'], META)).toThrow('/auto takes on, off or status, got "maybe"');
  });
});
