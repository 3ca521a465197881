import { describe, expect, it } from 'vitest';
import { instanceBusy, isOrchestratorError, OrchestratorError, toOrchestratorError } from './errors';

describe('toOrchestratorError', () => {
  it('passes orchestrator errors through', () => {
    const err = instanceBusy('short', 'go_long-1');
    expect(toOrchestratorError(err, 'long')).toBe(err);
    expect(err.detail).toEqual({ holder: 'go_long-1' });
  });

  it('attributes foreign errors to a venue as unreachable', () => {
    const cause = new Error('ECONNRESET');
    const err = toOrchestratorError(cause, 'long');
    expect(err).toMatchObject({ code: 'InstanceUnreachable', venue: 'long', message: 'long venue unreachable: ECONNRESET' });
    expect(err.cause).toBe(cause);
  });

  it('treats foreign errors without a venue as invalid arguments', () => {
    expect(toOrchestratorError('bad input')).toMatchObject({ code: 'InvalidArguments', message: 'bad input' });
  });
});

describe('isOrchestratorError', () => {
  it('matches on the code when one is given', () => {
    const err = new OrchestratorError('NotArmed', '/flat requires /arm first');
    expect(isOrchestratorError(err)).toBe(true);
    expect(isOrchestratorError(err, 'NotArmed')).toBe(true);
    expect(isOrchestratorError(err, 'Unauthorized')).toBe(false);
    expect(isOrchestratorError(new Error('plain'))).toBe(false);
  });
});
