import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parseDaysBack, parseList } from '@cli/options';

describe('parseList', () => {
  it('should split on commas and drop blanks', () => {
    expect(parseList('us-east-1, eu-west-1,,')).toEqual(['us-east-1', 'eu-west-1']);
  });
});

describe('parseDaysBack', () => {
  it('should accept positive whole numbers', () => {
    expect(parseDaysBack('45')).toBe(45);
  });

  it.each(['0', '-3', '1.5', 'thirty'])('should reject %s', (value) => {
    expect(() => parseDaysBack(value)).toThrow(InvalidArgumentError);
  });
});
