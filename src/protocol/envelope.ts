/**
 * Request/response envelopes for the Ghostty IPC protocol
 */

import { ProtocolError } from '../errors.js';
import type { ButtonAction, MouseButton, ScreenKind } from '../types/index.js';

export const PROTOCOL_VERSION = 1;

type SurfaceScoped = { surface_id: string };

export type ActionPayloads = {
  list_surfaces: Record<string, never>;
  new_window: { arguments?: string[] };
  new_tab: { arguments?: string[] };
  send_text: SurfaceScoped & { text: string };
  send_key: SurfaceScoped & { key: string; action: ButtonAction; mods?: string };
  send_mouse: SurfaceScoped & {
    x: number;
    y: number;
    button?: MouseButton;
    button_action?: ButtonAction;
    mods?: string;
  };
  send_scroll: SurfaceScoped & { x: number; y: number; mods?: string };
  get_screen: SurfaceScoped & { screen: ScreenKind; format?: 'cells' };
  focus_surface: SurfaceScoped;
  close_surface: SurfaceScoped;
  resize_surface: SurfaceScoped & { rows?: number; cols?: number };
  screenshot_surface: SurfaceScoped & { output_path: string };
};

export type ActionName = keyof ActionPayloads;

const ACTION_SPECS: Record<ActionName, { surfaceScoped: boolean }> = {
  list_surfaces: { surfaceScoped: false },
  new_window: { surfaceScoped: false },
  new_tab: { surfaceScoped: false },
  send_text: { surfaceScoped: true },
  send_key: { surfaceScoped: true },
  send_mouse: { surfaceScoped: true },
  send_scroll: { surfaceScoped: true },
  get_screen: { surfaceScoped: true },
  focus_surface: { surfaceScoped: true },
  close_surface: { surfaceScoped: true },
  resize_surface: { surfaceScoped: true },
  screenshot_surface: { surfaceScoped: true },
};

export type RequestEnvelope = {
  version: number;
  target: string | null;
  action: Record<string, object>;
};

export type ResponseData = Record<string, unknown>;

export type SuccessResponse = {
  ok: true;
  data: ResponseData;
};

export function isActionName(value: string): value is ActionName {
  return Object.prototype.hasOwnProperty.call(ACTION_SPECS, value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function buildRequest<A extends ActionName>(
  action: A,
  payload: ActionPayloads[A] | undefined,
  target: string | null = null,
): RequestEnvelope {
  if (!isActionName(action)) {
    throw new ProtocolError(`Unmapped action: ${String(action)}`);
  }

  if (ACTION_SPECS[action].surfaceScoped) {
    const raw: unknown = payload;
    const surfaceId = isRecord(raw) ? raw.surface_id : undefined;
    if (typeof surfaceId !== 'string' || surfaceId.length === 0) {
      throw new ProtocolError(`Action ${action} requires a surface_id`);
    }
  }

  return {
    version: PROTOCOL_VERSION,
    target,
    action: { [action]: payload ?? {} },
  };
}

export function encodeRequest(envelope: RequestEnvelope): Buffer {
  return Buffer.from(JSON.stringify(envelope), 'utf8');
}

/**
 * Parse a response body. A truthy `ok` is success; otherwise the response
 * carries the host's error string.
 */
export function parseResponse(body: Buffer | string): SuccessResponse {
  const text = typeof body === 'string' ? body : body.toString('utf8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ProtocolError('Invalid JSON response from Ghostty', { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new ProtocolError('Invalid response shape');
  }

  if (!parsed.ok) {
    const serverError = typeof parsed.error === 'string' && parsed.error.length > 0 ? parsed.error : undefined;
    throw new ProtocolError(serverError ?? 'Unknown error', { serverError });
  }

  return {
    ok: true,
    data: isRecord(parsed.data) ? parsed.data : {},
  };
}
