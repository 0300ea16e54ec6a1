declare module 'pos' {
  export class Lexer {
    lex(text: string): string[];
  }

  export class Tagger {
    tag(tokens: string[]): Array<[string, string]>;
  }

  const pos: {
    Lexer: typeof Lexer;
    Tagger: typeof Tagger;
  };
  export default pos;
}
