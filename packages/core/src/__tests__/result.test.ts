import { describe, it, expect } from 'vitest';
import { Ok, Err, isOk, isErr, type Result } from '../types/result.js';

describe('Result', () => {
  it('should expose the value of an Ok', () => {
    const result: Result<number, string> = Ok(2);

    expect(isOk(result)).toBe(true);
    expect(result.unwrap()).toBe(2);
    expect(result.map((n) => n * 3).unwrap()).toBe(6);
    expect(result.toNullable()).toBe(2);
  });

  it('should expose the error of an Err', () => {
    const result: Result<number, string> = Err('missing');

    expect(isErr(result)).toBe(true);
    expect(result.unwrapErr()).toBe('missing');
    expect(result.toNullable()).toBeNull();
  });

  it('should throw when unwrapping the wrong variant', () => {
    expect(() => Err<number, Error>(new Error('gone')).unwrap()).toThrow('gone');
    expect(() => Ok(1).unwrapErr()).toThrow('Called unwrapErr on an Ok result');
  });
});
