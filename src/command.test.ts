import { vi } from 'vitest';
import { parseCommand, parseEffect } from './command';
import { InvalidCommandError } from './errors';

describe('parseCommand', () => {
  it('should parse state and brightness', () => {
    expect(parseCommand('{"state":"ON","brightness":80}')).toEqual({ state: 'ON', brightness: 80 });
  });

  it('should drop keys it does not use', () => {
    expect(parseCommand('{"state":"OFF","transition":2}')).toEqual({ state: 'OFF' });
  });

  it('should read colour temperature under both names', () => {
    expect(parseCommand('{"color_temp":300}')).toEqual({ colorTemp: 300 });
    expect(parseCommand('{"colorTemp":300}')).toEqual({ colorTemp: 300 });
    expect(parseCommand('{"color_temp":300,"colorTemp":200}')).toEqual({ colorTemp: 300 });
  });

  it('should parse a colour', () => {
    expect(parseCommand('{"color":{"r":1,"g":2,"b":3}}')).toEqual({ color: { r: 1, g: 2, b: 3 } });
  });

  it('should throw InvalidCommandError for malformed JSON', () => {
    expect(() => parseCommand('{state')).toThrow(InvalidCommandError);
    expect(() => parseCommand('{state')).toThrow(/^Command is not valid JSON/);
  });

  it('should name the offending field', () => {
    expect(() => parseCommand('{"brightness":"high"}')).toThrow(/^Invalid command: brightness: /);
  });

  it('should reject a colour missing a component', () => {
    expect(() => parseCommand('{"color":{"r":1,"g":2}}')).toThrow(InvalidCommandError);
  });

  it('should drop an effect that is not text or an object', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(parseCommand('{"state":"ON","effect":5}')).toEqual({ state: 'ON' });
    expect(parseCommand('{"brightness":10,"effect":null}')).toEqual({ brightness: 10 });
    expect(warn).toHaveBeenCalledTimes(2);

    warn.mockRestore();
  });
});

describe('parseEffect', () => {
  it('should treat plain text as a scene', () => {
    expect(parseEffect('bright')).toEqual({ kind: 'scene', scene: 'bright' });
  });

  it('should treat JSON text holding a string as a scene', () => {
    expect(parseEffect('"nebula"')).toEqual({ kind: 'scene', scene: 'nebula' });
  });

  it('should treat JSON text holding a number as a scene name', () => {
    expect(parseEffect('42')).toEqual({ kind: 'scene', scene: '42' });
  });

  it('should decode JSON objects given as text', () => {
    expect(parseEffect('{"scene":"meteor"}')).toEqual({ kind: 'scene', scene: 'meteor' });
  });

  it('should prefer the scene over other effects', () => {
    expect(parseEffect({ scene: 'sled', music: 'spectrum' })).toEqual({ kind: 'scene', scene: 'sled' });
  });

  it('should default music to calm with full sensitivity', () => {
    expect(parseEffect({ music: 'spectrum' })).toEqual({
      kind: 'music',
      music: 'spectrum',
      calm: true,
      sensitivity: 100,
    });
  });

  it('should fill video defaults', () => {
    expect(parseEffect({ video: 'part' })).toEqual({
      kind: 'video',
      video: 'part',
      game: false,
      sound: false,
      sensitivity: 100,
      tvBrightness: [100, 100, 100, 100],
    });
  });

  it('should fall back to a plain effect', () => {
    expect(parseEffect({})).toEqual({ kind: 'plain' });
    expect(parseEffect({ mask: '' })).toEqual({ kind: 'plain' });
    expect(parseEffect({ mask: '1100' })).toEqual({ kind: 'plain', mask: '1100' });
  });

  it('should reject wrongly typed effect fields', () => {
    expect(() => parseEffect({ sensitivity: 'loud' })).toThrow(InvalidCommandError);
  });
});
