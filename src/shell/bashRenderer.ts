import { doubleQuote, escapeDoubleQuoted, shellEscape } from './escape';
import { AnsiColor, CmdOptions, Instruction } from './interfaces';

const INDENT = '  ';

const ANSI_CODES: Record<AnsiColor, string> = {
  red: '31;1',
  green: '32;1',
  yellow: '33;1',
};

export const RETRY_ATTEMPTS = 3;

/**
 * Helpers the rendered commands call into
 */
export const SCRIPT_PREAMBLE = [
  '#!/usr/bin/env bash',
  '',
  'cache_retry() {',
  '  local result=0',
  '  local count=1',
  `  while [ $count -le ${RETRY_ATTEMPTS} ]; do`,
  `    [ $result -ne 0 ] && echo -e "\\033[31;1mThe command \\"$*\\" failed. Retrying, $count of ${RETRY_ATTEMPTS}.\\033[0m" >&2`,
  '    "$@" && { result=0 && break; } || result=$?',
  '    count=$((count + 1))',
  '    sleep 1',
  '  done',
  `  [ $count -gt ${RETRY_ATTEMPTS} ] && echo -e "\\033[31;1mThe command \\"$*\\" failed ${RETRY_ATTEMPTS} times.\\033[0m" >&2`,
  '  return $result',
  '}',
  '',
  'cache_timed() {',
  '  local start=$SECONDS',
  '  "$@"',
  '  local result=$?',
  '  echo "Finished in $((SECONDS - start))s"',
  '  return $result',
  '}',
  '',
];

function colorize(text: string, color: AnsiColor | undefined): string {
  if (!color) {
    return `echo ${doubleQuote(text)}`;
  }
  return `echo -e "\\033[${ANSI_CODES[color]}m${escapeDoubleQuoted(text)}\\033[0m"`;
}

function renderCmd(text: string, options: CmdOptions): string[] {
  const lines: string[] = [];

  if (options.echo === true) {
    lines.push(`echo ${shellEscape(`$ ${text}`)}`);
  } else if (typeof options.echo === 'string') {
    lines.push(`echo ${shellEscape(options.echo)}`);
  }

  let command = text;
  if (options.retry) {
    command = `cache_retry ${command}`;
  }
  if (options.timing) {
    command = `cache_timed ${command}`;
  }
  if (options.assert) {
    command = `${command} || exit $?`;
  }
  lines.push(command);

  return lines;
}

function renderInstruction(instruction: Instruction): string[] {
  switch (instruction.kind) {
    case 'cmd':
      return renderCmd(instruction.text, instruction.options);

    case 'raw':
      return [instruction.text];

    case 'if':
      return [
        `if [[ ${instruction.condition} ]]; then`,
        ...indent(renderBody(instruction.body)),
        'fi',
      ];

    case 'fold':
      return [
        `echo ${doubleQuote(`::group::${instruction.label}`)}`,
        ...renderInstructions(instruction.body),
        `echo ${doubleQuote('::endgroup::')}`,
      ];

    case 'echo':
      return [colorize(instruction.text, instruction.options.ansi)];

    case 'export':
      return [`export ${instruction.name}=${doubleQuote(instruction.value, true)}`];

    case 'mkdir': {
      const flags = instruction.options.recursive ? '-p ' : '';
      return renderCmd(`mkdir ${flags}${instruction.path}`, { echo: instruction.options.echo });
    }

    case 'chmod':
      return renderCmd(`chmod ${instruction.mode} ${instruction.path}`, {
        echo: instruction.options.echo,
        assert: instruction.options.assert,
      });
  }
}

function renderBody(body: readonly Instruction[]): string[] {
  const lines = renderInstructions(body);
  // bash rejects an empty then-branch
  return lines.length > 0 ? lines : [':'];
}

function indent(lines: string[]): string[] {
  return lines.map(line => (line === '' ? line : `${INDENT}${line}`));
}

/**
 * Render planned instructions as the lines of a bash script (without preamble)
 */
export function renderInstructions(instructions: readonly Instruction[]): string[] {
  return instructions.flatMap(renderInstruction);
}

/**
 * Render planned instructions as a complete, executable bash script
 */
export function renderScript(instructions: readonly Instruction[]): string {
  return [...SCRIPT_PREAMBLE, ...renderInstructions(instructions)].join('\n') + '\n';
}
