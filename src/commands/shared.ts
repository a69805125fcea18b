/**
 * Helpers shared by the command modules: global options, container setup,
 * terminal styling.
 */

import { Command, InvalidArgumentError } from 'commander';
import { createProjectContext, type ProjectContext } from '../core/project-context.js';
import { createDefaultContainer, type ComponentName, type ServiceContainer } from '../core/container.js';

export interface GlobalOptions {
  cwd?: string;
  config?: string;
  signaling?: string;
  timeout?: number;
}

const DIM = '\x1b[2m';
const RESET = '\x1b[0m';

export function dim(text: string): string {
  return `${DIM}${text}${RESET}`;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function readGlobalOptions(command: Command): GlobalOptions {
  const raw: Record<string, unknown> = command.optsWithGlobals();
  return {
    cwd: typeof raw.cwd === 'string' ? raw.cwd : undefined,
    config: typeof raw.config === 'string' ? raw.config : undefined,
    signaling: typeof raw.signaling === 'string' ? raw.signaling : undefined,
    timeout: typeof raw.timeout === 'number' ? raw.timeout : undefined
  };
}

export interface CommandSession {
  context: ProjectContext;
  container: ServiceContainer;
}

/**
 * Build the context and container for a command, check the components it
 * needs, run it, then close any signaling connection it opened.
 */
export async function runWithContainer<T>(
  command: Command,
  required: readonly ComponentName[],
  run: (session: CommandSession) => Promise<T>
): Promise<T> {
  const globals = readGlobalOptions(command);
  const context = await createProjectContext({
    cwd: globals.cwd,
    config: globals.config,
    signalingUrl: globals.signaling,
    timeoutMs: globals.timeout
  });
  const container = createDefaultContainer(context);
  container.validate(required);

  try {
    return await run({ context, container });
  } finally {
    container.dispose();
  }
}
