import { describe, it, expect } from 'vitest';
import { lcsLength, partialRatio, similarityRatio } from '@bankstmt/bank-identifier';

describe('lcsLength', () => {
  it('should measure the longest common subsequence', () => {
    expect(lcsLength('abcd', 'abxd')).toBe(3);
    expect(lcsLength('hsbc', 'hsbc')).toBe(4);
    expect(lcsLength('abc', '')).toBe(0);
  });
});

describe('similarityRatio', () => {
  it('should be 2·LCS over the combined length', () => {
    expect(similarityRatio('abcd', 'abxd')).toBe(0.75);
    expect(similarityRatio('abc', 'xyz')).toBe(0);
  });

  it('should treat two empty strings as identical', () => {
    expect(similarityRatio('', '')).toBe(1);
  });
});

describe('partialRatio', () => {
  it('should score an exact substring 100', () => {
    expect(partialRatio('hsbc', 'xxhsbcxx')).toBe(100);
    expect(partialRatio('xxhsbcxx', 'hsbc')).toBe(100);
  });

  it('should score the best-aligned window', () => {
    expect(partialRatio('abcd', 'abxd')).toBe(75);
    expect(partialRatio('bank', 'the bonk statement')).toBe(75);
  });

  it('should score unrelated strings 0', () => {
    expect(partialRatio('abc', 'xyz')).toBe(0);
  });

  it('should score an empty side 0', () => {
    expect(partialRatio('', 'abc')).toBe(0);
    expect(partialRatio('abc', '')).toBe(0);
  });

  it('should compare Chinese text character by character', () => {
    expect(partialRatio('汇丰银行', '香港汇丰银行有限公司')).toBe(100);
    expect(partialRatio('汇丰银行', '汇丰集团')).toBe(50);
  });
});
