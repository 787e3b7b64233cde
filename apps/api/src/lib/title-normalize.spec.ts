import {
  buildTitleQueryVariants,
  decodeHtmlEntities,
  normalizeTitleForMatching,
  splitTitleAndYear,
  titleMatchKey,
  titleSimilarity,
  titleYearKey,
} from './title-normalize';

describe('title normalization', () => {
  it('decodes numeric and named entities', () => {
    expect(decodeHtmlEntities('WALL&#183;E')).toBe('WALL·E');
    expect(decodeHtmlEntities('WALL&#xB7;E')).toBe('WALL·E');
    expect(decodeHtmlEntities('Fast &amp; Furious')).toBe('Fast & Furious');
    expect(decodeHtmlEntities('&bogus;')).toBe('&bogus;');
  });

  it('folds whitespace, quotes and dashes', () => {
    expect(normalizeTitleForMatching('  Ocean’s   Eleven ')).toBe("Ocean's Eleven");
    expect(normalizeTitleForMatching('Spider–Man')).toBe('Spider-Man');
  });

  it('builds comparison keys', () => {
    expect(titleMatchKey('Spider-Man: No Way Home')).toBe('spider man no way home');
    expect(titleMatchKey("Ocean's Eleven")).toBe('oceans eleven');
    expect(titleMatchKey('Fast &amp; Furious')).toBe('fast and furious');
    expect(titleYearKey('Heat', 1995)).toBe('heat|1995');
    expect(titleYearKey('Heat', null)).toBe('heat|');
  });

  it('splits a trailing year', () => {
    expect(splitTitleAndYear('Alien (1979)')).toEqual({ title: 'Alien', year: 1979 });
    expect(splitTitleAndYear('2001: A Space Odyssey')).toEqual({
      title: '2001: A Space Odyssey',
      year: null,
    });
  });

  it('builds distinct query variants, punctuation-stripped second', () => {
    expect(buildTitleQueryVariants('Spider-Man: Homecoming')).toEqual([
      'Spider-Man: Homecoming',
      'Spider Man Homecoming',
      'Spider Man: Homecoming',
    ]);
    expect(buildTitleQueryVariants('   ')).toEqual([]);
  });

  it('scores similarity with the Dice coefficient', () => {
    expect(titleSimilarity('Inception', 'inception')).toBe(1);
    expect(titleSimilarity('The Matrix', 'Matrix')).toBeCloseTo(10 / 13);
    expect(titleSimilarity('Night', 'Nacht')).toBeCloseTo(0.25);
    expect(titleSimilarity('', 'Heat')).toBe(0);
  });
});
