/**
 * Command dispatch between the stores and the in-process backend.
 *
 * Mirrors an IPC boundary: callers name a command and pass plain arguments;
 * results come back as promises.
 */
import { Backend, type BackendOptions } from "../backend/backend";
import {
  type CommandHandlers,
  type CommandMap,
  type CommandName,
  createCommandHandlers,
} from "../backend/commands";
import { BackendError } from "../backend/errors";

let backend: Backend | null = null;
let handlers: CommandHandlers | null = null;

/**
 * Open the backend. Replaces (and closes) any backend opened before.
 */
export function initBackend(options: BackendOptions): Backend {
  closeBackend();
  backend = new Backend(options);
  handlers = createCommandHandlers(backend);
  return backend;
}

export function closeBackend(): void {
  backend?.close();
  backend = null;
  handlers = null;
}

export function getBackend(): Backend {
  if (!backend) {
    throw new BackendError("NOT_INITIALIZED", "Backend not initialized; call initBackend() first");
  }
  return backend;
}

/**
 * Run a backend command
 */
export async function invoke<K extends CommandName>(
  command: K,
  args: CommandMap[K]["args"],
): Promise<CommandMap[K]["result"]> {
  if (!handlers) {
    throw new BackendError("NOT_INITIALIZED", `Backend not initialized (command: ${command})`);
  }
  const handler: CommandHandlers[K] = handlers[command];
  return handler(args);
}
