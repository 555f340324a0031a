import { checkWritingQuality } from './writing-quality';

describe('checkWritingQuality', () => {
  it('should apply the Task 1 minimum of 150 words', () => {
    expect(checkWritingQuality('word '.repeat(150), 1)).toEqual({
      wordCount: 150,
      minWords: 150,
      meetsMinimum: true,
      isEmpty: false,
    });
  });

  it('should flag a short Task 2 essay', () => {
    expect(checkWritingQuality('Too short to count.', 2)).toEqual({
      wordCount: 4,
      minWords: 250,
      meetsMinimum: false,
      isEmpty: false,
    });
  });

  it('should treat whitespace as empty', () => {
    expect(checkWritingQuality(' \n\t ', 2).isEmpty).toBe(true);
  });
});
