import { describe, expect, it } from 'vitest';
import { isValidSessionName, parseReply } from '../../src/services/message-parser.js';

describe('parseReply', () => {
  it('splits destination and payload on the first colon', () => {
    expect(parseReply('claude-session: Deploy to production')).toEqual({
      destination: 'claude-session',
      payload: 'Deploy to production',
    });
  });

  it('round-trips any valid name with any non-empty payload', () => {
    const names = ['a', 'build_server_1', 'msg-1234567890-12345', 'UPPER-lower_09'];
    const payloads = ['x', ' leading space kept', 'Time: 14:30, Status: Ready', 'tab\tand\nnewline', '  '];

    for (const name of names) {
      for (const payload of payloads) {
        expect(parseReply(`${name}: ${payload}`)).toEqual({ destination: name, payload });
      }
    }
  });

  it('keeps colons that follow the separator', () => {
    expect(parseReply('deploy-agent: Time: 14:30')?.payload).toBe('Time: 14:30');
  });

  it('strips exactly one space after the colon', () => {
    expect(parseReply('test-session:     Multiple spaces')).toEqual({
      destination: 'test-session',
      payload: '    Multiple spaces',
    });
    expect(parseReply('sess:no-space')).toEqual({ destination: 'sess', payload: 'no-space' });
  });

  it('preserves multi-line payloads', () => {
    expect(parseReply('sess: line1\nline2')).toEqual({ destination: 'sess', payload: 'line1\nline2' });
  });

  it('rejects text without a separator', () => {
    expect(parseReply('hello world')).toBeNull();
  });

  it('rejects an empty destination', () => {
    expect(parseReply(': hello')).toBeNull();
  });

  it('rejects destinations outside the session-name charset', () => {
    expect(parseReply('session@name: Invalid characters')).toBeNull();
    expect(parseReply(' sess: leading whitespace')).toBeNull();
    expect(parseReply('sess : trailing whitespace')).toBeNull();
    expect(parseReply('two words: nope')).toBeNull();
  });

  it('rejects an empty payload', () => {
    expect(parseReply('session-name: ')).toBeNull();
    expect(parseReply('session-name:')).toBeNull();
  });

  it('preserves case in the destination', () => {
    expect(parseReply('Build-1: go')?.destination).toBe('Build-1');
  });
});

describe('isValidSessionName', () => {
  it('accepts letters, digits, underscore and hyphen only', () => {
    expect(isValidSessionName('build-1_a')).toBe(true);
    expect(isValidSessionName('build.1')).toBe(false);
    expect(isValidSessionName('')).toBe(false);
  });
});
