import { doubleQuote, shellEscape } from '../../../src/shell/escape';

describe('shellEscape', () => {
  it('leaves safe words alone', () => {
    expect(shellEscape('abc-1.2_3,x:y+z/w@v')).toBe('abc-1.2_3,x:y+z/w@v');
  });

  it('escapes URL query characters', () => {
    expect(shellEscape('https://b.example.com/a.tgz?x=1&y=%2F')).toBe(
      'https://b.example.com/a.tgz\\?x\\=1\\&y\\=\\%2F'
    );
  });

  it('escapes spaces, quotes and dollars', () => {
    expect(shellEscape(`it's $HOME`)).toBe("it\\'s\\ \\$HOME");
  });

  it('quotes newlines', () => {
    expect(shellEscape('a\nb')).toBe("a'\n'b");
  });

  it('represents the empty string as empty quotes', () => {
    expect(shellEscape('')).toBe("''");
  });
});

describe('doubleQuote', () => {
  it('escapes quotes, backslashes, backticks and dollars', () => {
    expect(doubleQuote('say "hi" `x` \\ $HOME')).toBe('"say \\"hi\\" \\`x\\` \\\\ \\$HOME"');
  });

  it('keeps variable references live when expanding', () => {
    expect(doubleQuote('$HOME/.casher', true)).toBe('"$HOME/.casher"');
  });
});
