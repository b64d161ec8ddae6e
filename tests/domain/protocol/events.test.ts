import {
  decodeInboundEvent,
  encodeOutboundEvent,
} from '../../../src/domain/protocol/events';
import { MalformedEventError } from '../../../src/domain/errors/errors';
import { chunkEvent, pcm, rawEvent } from '../../helpers/fakes';

describe('decodeInboundEvent', () => {
  test('describe and audio-stop', () => {
    expect(decodeInboundEvent(rawEvent('describe'))).toEqual({ kind: 'describe' });
    expect(decodeInboundEvent(rawEvent('audio-stop', { timestamp: 1500 }))).toEqual({
      kind: 'audio-stop',
      timestamp: 1500,
    });
  });

  test('detect keeps every requested name in order', () => {
    expect(decodeInboundEvent(rawEvent('detect', { names: ['ok home', 'porcupine'] }))).toEqual({
      kind: 'detect',
      names: ['ok home', 'porcupine'],
    });
    expect(decodeInboundEvent(rawEvent('detect'))).toEqual({ kind: 'detect', names: [] });
  });

  test('detect rejects names that are not strings', () => {
    expect(() => decodeInboundEvent(rawEvent('detect', { names: ['ok home', 3] }))).toThrow(
      MalformedEventError
    );
    expect(() => decodeInboundEvent(rawEvent('detect', { names: 'ok home' }))).toThrow(
      'detect: names must be a list of strings'
    );
  });

  test('audio-start carries the format', () => {
    expect(
      decodeInboundEvent(rawEvent('audio-start', { rate: 22050, width: 2, channels: 2 }))
    ).toEqual({
      kind: 'audio-start',
      format: { rate: 22050, width: 2, channels: 2 },
      timestamp: undefined,
    });
  });

  test('audio-chunk carries format, timestamp and payload', () => {
    const audio = pcm(1, 2, 3);
    const decoded = decodeInboundEvent(chunkEvent(audio, 64));

    expect(decoded).toEqual({
      kind: 'audio-chunk',
      chunk: { rate: 16000, width: 2, channels: 1, timestamp: 64, audio },
    });
  });

  test('audio-chunk without a payload decodes to empty audio', () => {
    const decoded = decodeInboundEvent(rawEvent('audio-chunk', { rate: 16000, width: 2, channels: 1 }));
    expect(decoded.kind === 'audio-chunk' && decoded.chunk.audio.length).toBe(0);
  });

  test('audio events with missing or invalid format fields are malformed', () => {
    expect(() => decodeInboundEvent(rawEvent('audio-chunk', { rate: 16000, width: 2 }))).toThrow(
      'audio-chunk: channels must be a positive integer'
    );
    expect(() =>
      decodeInboundEvent(rawEvent('audio-start', { rate: '16000', width: 2, channels: 1 }))
    ).toThrow('audio-start: rate must be a positive integer');
    expect(() =>
      decodeInboundEvent(rawEvent('audio-stop', { timestamp: 'later' }))
    ).toThrow('audio-stop: timestamp must be a number');
  });

  test('other event types are preserved as unknown', () => {
    expect(decodeInboundEvent(rawEvent('transcribe', { language: 'en' }))).toEqual({
      kind: 'unknown',
      type: 'transcribe',
      data: { language: 'en' },
    });
  });
});

describe('encodeOutboundEvent', () => {
  test('detection includes the timestamp only when known', () => {
    expect(encodeOutboundEvent({ kind: 'detection', name: 'ok home', timestamp: 320 })).toEqual({
      type: 'detection',
      data: { name: 'ok home', timestamp: 320 },
      payload: null,
    });
    expect(encodeOutboundEvent({ kind: 'detection', name: 'ok home' })).toEqual({
      type: 'detection',
      data: { name: 'ok home' },
      payload: null,
    });
  });

  test('not-detected has no data', () => {
    expect(encodeOutboundEvent({ kind: 'not-detected' })).toEqual({
      type: 'not-detected',
      data: {},
      payload: null,
    });
  });

  test('info lists only wake programs alongside empty service lists', () => {
    const encoded = encodeOutboundEvent({ kind: 'info', info: { wake: [] } });
    expect(encoded).toEqual({
      type: 'info',
      data: { asr: [], tts: [], handle: [], intent: [], wake: [] },
      payload: null,
    });
  });
});
