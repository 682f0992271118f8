import {
  ChmodOptions,
  CmdOptions,
  EchoOptions,
  Instruction,
  MkdirOptions,
  ShellEmitter,
} from './interfaces';

/**
 * ShellEmitter that records instructions as data.
 * Blocks passed to `if` and `fold` are recorded into the body of the
 * enclosing instruction.
 */
export class InstructionRecorder implements ShellEmitter {
  private readonly root: Instruction[] = [];
  private current: Instruction[] = this.root;

  get instructions(): readonly Instruction[] {
    return this.root;
  }

  cmd(text: string, options: CmdOptions = {}): void {
    this.current.push({ kind: 'cmd', text, options });
  }

  raw(text: string): void {
    this.current.push({ kind: 'raw', text });
  }

  if(condition: string, block: () => void): void {
    const body: Instruction[] = [];
    this.current.push({ kind: 'if', condition, body });
    this.nest(body, block);
  }

  fold(label: string, block: () => void): void {
    const body: Instruction[] = [];
    this.current.push({ kind: 'fold', label, body });
    this.nest(body, block);
  }

  echo(text: string, options: EchoOptions = {}): void {
    this.current.push({ kind: 'echo', text, options });
  }

  export(name: string, value: string): void {
    this.current.push({ kind: 'export', name, value });
  }

  mkdir(path: string, options: MkdirOptions = {}): void {
    this.current.push({ kind: 'mkdir', path, options });
  }

  chmod(mode: string, path: string, options: ChmodOptions = {}): void {
    this.current.push({ kind: 'chmod', mode, path, options });
  }

  private nest(body: Instruction[], block: () => void): void {
    const parent = this.current;
    this.current = body;
    try {
      block();
    } finally {
      this.current = parent;
    }
  }
}

export function createInstructionRecorder(): InstructionRecorder {
  return new InstructionRecorder();
}
