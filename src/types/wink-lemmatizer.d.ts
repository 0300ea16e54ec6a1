declare module 'wink-lemmatizer' {
  /** Each returns the base form, or the input when it has none */
  const lemmatize: {
    noun(word: string): string;
    verb(word: string): string;
    adjective(word: string): string;
  };
  export default lemmatize;
}
