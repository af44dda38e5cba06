import { describe, it, expect } from 'vitest';
import { commentText, splitComments } from '../../../src/source/comments.js';

describe('commentText', () => {
  it('should strip a line comment marker and one space', () => {
    expect(commentText('//  indented')).toBe(' indented');
  });

  it('should strip block comment markers', () => {
    expect(commentText('/* inline */')).toBe(' inline');
  });

  it('should strip JSDoc gutters', () => {
    expect(commentText('/**\n * first\n *   second\n */')).toBe('\nfirst\n  second\n');
  });
});

describe('splitComments', () => {
  it('should separate annotations from docs keeping order in each', () => {
    const result = splitComments('+ak:', 'doc one\n+ak:a:1\ndoc two\n  +ak:b');

    expect(result.docs).toEqual(['doc one', 'doc two']);
    expect(result.annotations).toEqual(['a:1', 'b']);
  });

  it('should concatenate several comment texts', () => {
    const result = splitComments('+ak:', 'leading', '+ak:trailing');

    expect(result.docs).toEqual(['leading']);
    expect(result.annotations).toEqual(['trailing']);
  });

  it('should collapse runs of blank lines', () => {
    const result = splitComments('+ak:', 'one\n\n\n\ntwo');

    expect(result.docs).toEqual(['one', '', 'two']);
  });

  it('should treat every line as documentation without a prefix', () => {
    expect(splitComments('', '+ak:x').docs).toEqual(['+ak:x']);
  });
});
