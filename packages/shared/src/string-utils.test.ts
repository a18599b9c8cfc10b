import { padStep, stripAnsi, truncateOutput } from './string-utils';

describe('stripAnsi', () => {
  it('removes ANSI escape codes', () => {
    expect(stripAnsi('hi \u001b[31mred\u001b[0m there')).toBe('hi red there');
  });

  it('leaves plain strings unchanged', () => {
    expect(stripAnsi('plain text')).toBe('plain text');
  });
});

describe('truncateOutput', () => {
  it('returns short output unchanged', () => {
    expect(truncateOutput('a\nb\n')).toEqual({ text: 'a\nb\n', truncated: false });
  });

  it('keeps the head and tail lines', () => {
    const content = ['1', '2', '3', '4', '5', '6'].map((l) => `${l}\n`).join('');
    const result = truncateOutput(content, { maxLines: 4 });
    expect(result).toEqual({
      text: '1\n2\n\n... [2 lines truncated] ...\n\n5\n6\n',
      truncated: true,
    });
  });

  it('cuts the middle bytes of a long single line', () => {
    const result = truncateOutput('a'.repeat(10) + 'b'.repeat(10), { maxBytes: 8 });
    expect(result).toEqual({
      text: 'aaaa\n... [content truncated] ...\nbbbb',
      truncated: true,
    });
  });
});

describe('padStep', () => {
  it('pads to four digits', () => {
    expect(padStep(7)).toBe('0007');
    expect(padStep(12345)).toBe('12345');
  });
});
