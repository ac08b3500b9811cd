const numberPattern = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

export const OPTIONS_END = "--";

/**
 * Holds the argument tokens after the program name and answers lookups against them.
 * Tokens after a bare `--` are never read as options.
 */
export class Tokenizer {
  #options: string[];
  #rest: string[];
  #inlineShortLength: number;

  constructor(tokens: readonly string[], { inlineShortLength = 2 }: { inlineShortLength?: number } = {}) {
    const end = tokens.indexOf(OPTIONS_END);
    this.#options = end === -1 ? [...tokens] : tokens.slice(0, end);
    this.#rest = end === -1 ? [] : tokens.slice(end + 1);
    this.#inlineShortLength = inlineShortLength;
  }

  /**
   * Builds a tokenizer from a process-style vector, skipping the program name at index 0.
   */
  static fromArgv(argv: readonly string[], options?: { inlineShortLength?: number }) {
    return new Tokenizer(argv.slice(1), options);
  }

  static isNumeric(token: string) {
    return numberPattern.test(token);
  }

  /**
   * A token looks like an option when it starts with `-` and is not a number such as `-3.14`.
   * A lone `-` is a value.
   */
  static isOptionLike(token: string) {
    return token.length > 1 && token.startsWith("-") && !Tokenizer.isNumeric(token);
  }

  get inlineShortLength() {
    return this.#inlineShortLength;
  }

  has(token: string) {
    return this.#options.includes(token);
  }

  /**
   * Finds the value given for `name`. The first token that matches wins:
   * `name value`, `--name=value`, or `-xvalue` for a short name of the inline length.
   * `reserved` lists tokens that are names in their own right and must not be split.
   * An empty value (`--name=`, `-x=`) counts as not given.
   */
  valueFor(name: string, reserved?: ReadonlySet<string>): string | undefined {
    return this.#firstValue(name, reserved) || undefined;
  }

  #firstValue(name: string, reserved?: ReadonlySet<string>): string | undefined {
    if (!name) return undefined;

    const isLong = name.startsWith("--");
    const inline = !isLong && name.length === this.#inlineShortLength;
    const tokens = this.#options;

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];

      if (token === name) {
        const next: string | undefined = tokens[i + 1];
        return next !== undefined && !Tokenizer.isOptionLike(next) ? next : undefined;
      }

      if (isLong && token.startsWith(`${name}=`)) {
        return token.slice(name.length + 1);
      }

      if (inline && token.length > name.length && token.startsWith(name) && !reserved?.has(token)) {
        const attached = token.slice(name.length);
        return attached.startsWith("=") ? attached.slice(1) : attached;
      }
    }

    return undefined;
  }

  /**
   * Returns the positional tokens in order. An option-like token for which `standsAlone`
   * is false is taken to consume the token after it, unless that token looks like an option too.
   */
  positionals(standsAlone: (token: string) => boolean): string[] {
    const positionals: string[] = [];
    const tokens = this.#options;

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];

      if (!Tokenizer.isOptionLike(token)) {
        positionals.push(token);
        continue;
      }
      if (standsAlone(token)) continue;

      const next: string | undefined = tokens[i + 1];
      if (next !== undefined && !Tokenizer.isOptionLike(next)) i++;
    }

    return [...positionals, ...this.#rest];
  }
}
