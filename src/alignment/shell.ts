export type WordPart =
  | { kind: "literal"; value: string }
  | { kind: "env"; name: string }
  | { kind: "subst"; code: string };

const SAFE_LITERAL_RE = /^[A-Za-z0-9_@%+=:,./-]+$/;
const ENV_NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function bashSingleQuote(value: string): string {
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

function renderLiteral(value: string): string {
  if (value === "") return "''";
  return SAFE_LITERAL_RE.test(value) ? value : bashSingleQuote(value);
}

/**
 * One shell word built from literal text, environment variable references and
 * command substitutions. Only literal parts are escaped; the others are
 * emitted double-quoted so the shell expands them exactly once.
 */
export class ShellWord {
  private constructor(readonly parts: readonly WordPart[]) {}

  static literal(value: string): ShellWord {
    return new ShellWord([{ kind: "literal", value }]);
  }

  static env(name: string): ShellWord {
    if (!ENV_NAME_RE.test(name)) throw new Error(`invalid env var name: ${name}`);
    return new ShellWord([{ kind: "env", name }]);
  }

  static subst(code: string): ShellWord {
    if (!code.trim()) throw new Error("command substitution must be non-empty");
    return new ShellWord([{ kind: "subst", code }]);
  }

  static concat(...words: Array<ShellWord | string>): ShellWord {
    const parts: WordPart[] = [];
    for (const w of words) {
      if (typeof w === "string") parts.push({ kind: "literal", value: w });
      else parts.push(...w.parts);
    }
    return new ShellWord(parts);
  }

  render(): string {
    if (this.parts.length === 0) return "''";
    return this.parts
      .map((p) => {
        switch (p.kind) {
          case "literal":
            return renderLiteral(p.value);
          case "env":
            return `"\${${p.name}}"`;
          case "subst":
            return `"$(${p.code})"`;
        }
      })
      .join("");
  }
}

export type Arg = ShellWord | string | number;

function toWord(arg: Arg): ShellWord {
  if (arg instanceof ShellWord) return arg;
  return ShellWord.literal(String(arg));
}

export class ShellCommand {
  private readonly words: ShellWord[];
  private stdoutTarget: ShellWord | null = null;

  constructor(program: string, ...args: Arg[]) {
    if (!program) throw new Error("program must be non-empty");
    this.words = [ShellWord.literal(program), ...args.map(toWord)];
  }

  arg(...args: Arg[]): this {
    this.words.push(...args.map(toWord));
    return this;
  }

  args(args: Iterable<Arg>): this {
    for (const a of args) this.words.push(toWord(a));
    return this;
  }

  redirectStdout(target: Arg): this {
    this.stdoutTarget = toWord(target);
    return this;
  }

  argv(): readonly ShellWord[] {
    return this.words;
  }

  render(): string {
    const line = this.words.map((w) => w.render()).join(" ");
    return this.stdoutTarget ? `${line} > ${this.stdoutTarget.render()}` : line;
  }
}

type Separator = "&&" | ";";

/**
 * Commands joined with `&&` (stop on failure) or `;` (run regardless).
 */
export class CommandChain {
  private readonly steps: Array<{ separator: Separator; command: ShellCommand }> = [];

  then(command: ShellCommand): this {
    this.steps.push({ separator: "&&", command });
    return this;
  }

  always(command: ShellCommand): this {
    this.steps.push({ separator: ";", command });
    return this;
  }

  commands(): ShellCommand[] {
    return this.steps.map((s) => s.command);
  }

  render(): string {
    let out = "";
    this.steps.forEach((s, i) => {
      const rendered = s.command.render();
      out = i === 0 ? rendered : `${out} ${s.separator} ${rendered}`;
    });
    return out;
  }
}
