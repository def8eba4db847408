import { formatCsvLine, parseCsvLine } from './csv';

describe('csv', () => {
  describe('formatCsvLine', () => {
    it('should join plain fields and end the line', () => {
      expect(formatCsvLine(['a', 'b', ''])).toBe('a,b,\n');
    });

    it('should quote fields with commas or quotes', () => {
      expect(formatCsvLine(['x,y', 'say "hi"'])).toBe('"x,y","say ""hi"""\n');
    });
  });

  describe('parseCsvLine', () => {
    it('should split quoted and empty fields', () => {
      expect(parseCsvLine('"x,y","say ""hi""",,z')).toEqual([
        'x,y',
        'say "hi"',
        '',
        'z',
      ]);
    });

    it('should reject an unterminated quote', () => {
      expect(() => parseCsvLine('"open,field')).toThrow(
        'Unterminated quoted field',
      );
    });
  });
});
