declare module 'wordnet-db' {
  const wordnet: {
    /** Absolute path of the bundled WordNet dict directory */
    path: string;
    version: string;
    files: string[];
  };
  export default wordnet;
}
