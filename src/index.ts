/**
 * ghostty-driver: drive Ghostty terminals over their control socket
 */

export { GhosttyClient, NEW_SURFACE_TIMEOUT_MS, type GhosttyClientOptions } from './client.js';
export { Terminal, type TerminalHost, type PointerOptions, type DragOptions, type ScrollOptions } from './terminal/terminal.js';
export { TerminalRegistry } from './terminal/registry.js';
export {
  TerminalExpect,
  DEFAULT_ABSENCE_TIMEOUT_MS,
  type AssertOptions,
  type ExpectTarget,
  type MetadataAssertOptions,
} from './sync/expect.js';
export {
  waitForText,
  waitForPrompt,
  waitForIdle,
  DEFAULT_PROMPT_PATTERN,
  DEFAULT_TIMEOUT_MS,
  type ScreenSource,
  type TextWaitOptions,
  type WaitOptions,
} from './sync/waits.js';
export { pollUntil, POLL_INTERVAL_MS, type PollOptions } from './sync/poller.js';
export { systemClock, type Clock } from './sync/clock.js';
export { Screen } from './screen/screen.js';
export { ScreenCells } from './screen/cells.js';
export { stripAnsi } from './screen/ansi.js';
export { formatColor, type Color } from './screen/color.js';
export { SocketTransport, type RequestSender } from './ipc/transport.js';
export { resolveSocketPath, validateSocketPath } from './ipc/socket-path.js';
export { MAX_MESSAGE_SIZE } from './ipc/framing.js';
export { PROTOCOL_VERSION, type ActionName, type ActionPayloads, type SuccessResponse } from './protocol/envelope.js';
export { extractSurfaces, extractWindows } from './protocol/surfaces.js';
export {
  ConfigManager,
  DEFAULT_REQUEST_TIMEOUT_MS,
  resolveDriverConfig,
  type ConfigOverrides,
  type StoredConfig,
} from './config/index.js';
export {
  DriverError,
  ConnectionError,
  ProtocolError,
  TimeoutError,
  AssertionFailure,
  NotFoundError,
  isDriverError,
  type ConnectionFailureReason,
  type DriverErrorCode,
} from './errors.js';
export type * from './types/index.js';
