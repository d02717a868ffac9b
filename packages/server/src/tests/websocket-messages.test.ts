import { describe, it, expect } from 'vitest';
import { decodeClientMessage } from '../websocket/server.js';

describe('decodeClientMessage', () => {
  it('decodes a JSON frame into a client event', () => {
    expect(decodeClientMessage(Buffer.from('{"type":"JUMP_TO","position":4}'))).toEqual({
      success: true,
      event: { type: 'JUMP_TO', position: 4 },
    });
  });

  it('joins fragmented frames', () => {
    const fragments = [Buffer.from('{"type":'), Buffer.from('"PREVIOUS"}')];
    expect(decodeClientMessage(fragments)).toEqual({ success: true, event: { type: 'PREVIOUS' } });
  });

  it('rejects frames that are not JSON', () => {
    expect(decodeClientMessage(Buffer.from('next please'))).toEqual({
      success: false,
      error: 'Message is not valid JSON',
    });
  });

  it('rejects JSON that is not a known event', () => {
    expect(decodeClientMessage(Buffer.from('{"type":"REMOVE_SLIDE"}'))).toEqual({
      success: false,
      error: 'position: Required',
    });
  });
});
