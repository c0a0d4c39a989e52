import { parseCsvMatrix } from './csv';

describe('parseCsvMatrix', () => {
  it('splits rows and fields', () => {
    expect(parseCsvMatrix('a,b\r\n1,2\n')).toEqual([
      ['a', 'b'],
      ['1', '2'],
    ]);
  });

  it('keeps commas, quotes and line breaks inside quoted fields', () => {
    expect(parseCsvMatrix('name,price\n"Box, large","¥1,200"\n"say ""hi""","a\nb"')).toEqual([
      ['name', 'price'],
      ['Box, large', '¥1,200'],
      ['say "hi"', 'a\nb'],
    ]);
  });

  it('drops a leading byte order mark', () => {
    expect(parseCsvMatrix('\uFEFFControl NO,Item NO')).toEqual([['Control NO', 'Item NO']]);
  });
});
