export type RshcConfig = {
  /** Path of the JSON-encoded AST bundle, or `-` for stdin. */
  bundle: string;
  /** Exported binding of the entry module to compile. */
  top: string;
  trace: boolean;
  /** Print the pretty-printed IR (the default output). */
  emitIr: boolean;
  /** Print the program as JSON. */
  json: boolean;
  /** Write the program as MessagePack bytes. */
  msgPack: boolean;
};
