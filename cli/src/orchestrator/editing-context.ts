/**
 * Source of the text a request sends.
 */
export interface IEditingContext {
  /**
   * The whole content of the context, lines joined with `\n`.
   */
  readText(): string;
}

/**
 * Editing context over text that has already been read (a file, stdin, or
 * a buffer composed in the user's editor).
 */
export class TextEditingContext implements IEditingContext {
  constructor(private readonly text: string) {}

  readText(): string {
    return this.text;
  }
}
