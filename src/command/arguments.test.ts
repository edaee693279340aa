import { describe, expect, test } from 'vitest';
import { parseArguments } from './arguments.ts';

describe('parseArguments', () => {
  test('splits on runs of whitespace', () => {
    expect(parseArguments('  123  456\tabc\n')).toEqual(['123', '456', 'abc']);
  });

  test('empty or blank input has no words', () => {
    expect(parseArguments('')).toEqual([]);
    expect(parseArguments('   ')).toEqual([]);
  });
});
