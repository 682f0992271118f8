export type AnsiColor = 'red' | 'green' | 'yellow';

export interface CmdOptions {
  /** Retry the command on a non-zero exit status */
  retry?: boolean;
  /** true prints the command itself, a string prints that text instead */
  echo?: boolean | string;
  /** Fail the job when the command fails */
  assert?: boolean;
  /** Report how long the command took */
  timing?: boolean;
}

export interface EchoOptions {
  ansi?: AnsiColor;
}

export interface MkdirOptions {
  echo?: boolean;
  recursive?: boolean;
}

export interface ChmodOptions {
  echo?: boolean;
  assert?: boolean;
}

/**
 * Planned shell instructions. Nothing is executed while planning; a
 * renderer or executor consumes these afterwards.
 */
export type Instruction =
  | { kind: 'cmd'; text: string; options: CmdOptions }
  | { kind: 'raw'; text: string }
  | { kind: 'if'; condition: string; body: Instruction[] }
  | { kind: 'fold'; label: string; body: Instruction[] }
  | { kind: 'echo'; text: string; options: EchoOptions }
  | { kind: 'export'; name: string; value: string }
  | { kind: 'mkdir'; path: string; options: MkdirOptions }
  | { kind: 'chmod'; mode: string; path: string; options: ChmodOptions };

export type InstructionKind = Instruction['kind'];

/**
 * Capability set the cache planner needs from a shell script builder
 */
export interface ShellEmitter {
  cmd(text: string, options?: CmdOptions): void;
  raw(text: string): void;
  if(condition: string, block: () => void): void;
  fold(label: string, block: () => void): void;
  echo(text: string, options?: EchoOptions): void;
  export(name: string, value: string): void;
  mkdir(path: string, options?: MkdirOptions): void;
  chmod(mode: string, path: string, options?: ChmodOptions): void;
}
