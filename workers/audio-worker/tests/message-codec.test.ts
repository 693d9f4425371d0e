import { describe, it, expect } from 'vitest';
import { createInvocation } from '@tracklab/test-utils';
import { decodeMessage, encodeWrappedMessage } from '../src/dispatch/message-codec';

const options = { defaultKind: 'hash_and_notify' };

describe('decodeMessage', () => {
  it.each([
    ['', 'empty'],
    ['   ', 'empty'],
    ['{not json', 'invalid_json'],
    ['{}', 'degenerate'],
    ['null', 'degenerate'],
    ['[]', 'degenerate'],
    ['42', 'degenerate']
  ])('should classify %j as %s', (raw, reason) => {
    expect(decodeMessage(raw, options)).toMatchObject({ malformed: true, reason });
  });

  it('should decode a direct message with top-level arguments', () => {
    const raw = JSON.stringify({ task: 'hash_and_notify', id: 'abc', stemId: 's1', filepath: 'uploads/a.wav' });

    expect(decodeMessage(raw, options)).toEqual({
      kind: 'hash_and_notify',
      id: 'abc',
      args: { stemId: 's1', filepath: 'uploads/a.wav' },
      positionalArgs: [],
      attempt: 0,
      envelope: 'direct'
    });
  });

  it('should prefer kwargs and positional args when a direct message has them', () => {
    const raw = JSON.stringify({ task: 'mix_stems', id: 'm1', attempt: 2, args: ['x'], kwargs: { stageId: 'st' }, extra: 1 });

    expect(decodeMessage(raw, options)).toEqual({
      kind: 'mix_stems',
      id: 'm1',
      args: { stageId: 'st' },
      positionalArgs: ['x'],
      attempt: 2,
      envelope: 'direct'
    });
  });

  it('should fall back to the default kind and a placeholder id', () => {
    const decoded = decodeMessage(JSON.stringify({ stemId: 's1', filepath: 'uploads/a.wav' }), options);

    expect(decoded).toMatchObject({ kind: 'hash_and_notify', args: { stemId: 's1', filepath: 'uploads/a.wav' } });
    expect('id' in decoded && decoded.id).toMatch(/^unknown-[0-9a-f-]{36}$/);
  });

  it('should build the placeholder id from the broker message id', () => {
    const raw = JSON.stringify({ stemId: 's1', filepath: 'uploads/a.wav' });

    const first = decodeMessage(raw, { ...options, messageId: 'msg-7' });
    const redelivered = decodeMessage(raw, { ...options, messageId: 'msg-7' });

    expect(first).toMatchObject({ id: 'unknown-msg-7' });
    expect(redelivered).toEqual(first);
  });

  it('should pass an unknown task name through unchanged', () => {
    expect(decodeMessage(JSON.stringify({ task: 'transcode_video', id: 'x' }), options)).toEqual({
      kind: 'transcode_video',
      id: 'x',
      args: {},
      positionalArgs: [],
      attempt: 0,
      envelope: 'direct'
    });
  });

  it('should decode a minimal wrapped message', () => {
    const raw = '{"headers":{"task":"X","id":"t1"},"body":"[[], {\\"a\\":1}]"}';

    expect(decodeMessage(raw, options)).toEqual({
      kind: 'X',
      id: 't1',
      args: { a: 1 },
      positionalArgs: [],
      attempt: 0,
      envelope: 'wrapped'
    });
  });

  it('should reject a message naming a task in headers without a body', () => {
    const raw = JSON.stringify({ headers: { task: 'analyze_audio', id: 't1' } });

    expect(decodeMessage(raw, options)).toMatchObject({ malformed: true, reason: 'invalid_envelope' });
  });

  it('should treat headers without a task as direct arguments', () => {
    const raw = JSON.stringify({ headers: { id: 'h' }, body: 'x', stemId: 's1' });

    expect(decodeMessage(raw, { ...options, messageId: 'msg-3' })).toEqual({
      kind: 'hash_and_notify',
      id: 'unknown-msg-3',
      args: { headers: { id: 'h' }, body: 'x', stemId: 's1' },
      positionalArgs: [],
      attempt: 0,
      envelope: 'direct'
    });
  });

  it('should decode a wrapped message', () => {
    const raw = JSON.stringify({
      headers: { task: 'app.tasks.generate_hash_and_webhook', id: 'w1', retries: 1 },
      body: JSON.stringify([[], { stemId: 's1', filepath: 'uploads/a.wav' }, {}])
    });

    expect(decodeMessage(raw, options)).toEqual({
      kind: 'app.tasks.generate_hash_and_webhook',
      id: 'w1',
      args: { stemId: 's1', filepath: 'uploads/a.wav' },
      positionalArgs: [],
      attempt: 1,
      envelope: 'wrapped'
    });
  });

  it('should decode a base64 wrapped body', () => {
    const body = Buffer.from(JSON.stringify([['p'], { stemId: 's2' }, {}])).toString('base64');
    const raw = JSON.stringify({
      headers: { task: 'analyze_audio', id: 'w2' },
      body,
      properties: { body_encoding: 'base64' }
    });

    expect(decodeMessage(raw, options)).toMatchObject({
      kind: 'analyze_audio',
      args: { stemId: 's2' },
      positionalArgs: ['p'],
      attempt: 0
    });
  });

  it('should reject a wrapped body that is not a JSON array', () => {
    const raw = JSON.stringify({ headers: { task: 'analyze_audio' }, body: '{"a":1}' });

    expect(decodeMessage(raw, options)).toMatchObject({ malformed: true, reason: 'invalid_envelope' });
  });
});

describe('encodeWrappedMessage', () => {
  it('should produce a wrapped message that decodes to the next attempt', () => {
    const invocation = createInvocation({ kind: 'analyze_audio', id: 'job-9', args: { stemId: 's9' } });

    const decoded = decodeMessage(encodeWrappedMessage(invocation, 3), options);

    expect(decoded).toEqual({
      kind: 'analyze_audio',
      id: 'job-9',
      args: { stemId: 's9' },
      positionalArgs: invocation.positionalArgs,
      attempt: 3,
      envelope: 'wrapped'
    });
  });
});
