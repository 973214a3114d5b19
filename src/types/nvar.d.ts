declare module 'nvar' {
  interface NvarOptions {
    /** Path of the env file, defaults to ".env" */
    path?: string;
    /** Raw env file contents, used instead of reading `path` */
    source?: string;
    /** Object receiving the parsed variables, defaults to process.env */
    target?: Record<string, string | undefined>;
    /** File encoding */
    enc?: string;
  }

  function nvar(options?: NvarOptions): void;

  export = nvar;
}
