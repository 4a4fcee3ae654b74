/**
 * Window metadata and the collaborator contracts the engine consumes
 */

import type { Predicate } from "./predicate";

export type WindowHandle = number;

/**
 * Immutable capture of the matchable metadata of one window
 */
export type WindowSnapshot = {
  readonly handle?: WindowHandle;
  readonly title: string;
  readonly className: string;
  readonly executable: string;
  readonly executablePath: string;
  readonly processId: number;
};

/**
 * "topLevel" searches application windows only, "all" also includes child and hidden windows
 */
export type DiscoveryMode = "topLevel" | "all";

export const DISCOVERY_MODES: readonly DiscoveryMode[] = ["topLevel", "all"];

export function isDiscoveryMode(value: unknown): value is DiscoveryMode {
  return DISCOVERY_MODES.some((mode) => mode === value);
}

export function createSnapshot(fields: Partial<WindowSnapshot> = {}): WindowSnapshot {
  const snapshot: WindowSnapshot = {
    title: fields.title ?? "",
    className: fields.className ?? "",
    executable: fields.executable ?? "",
    executablePath: fields.executablePath ?? "",
    processId: fields.processId ?? 0,
  };
  return Object.freeze(fields.handle === undefined ? snapshot : { handle: fields.handle, ...snapshot });
}

export const EMPTY_SNAPSHOT: WindowSnapshot = createSnapshot();

/**
 * Anything that can report the currently focused window
 */
export interface ActiveWindowSource {
  activeWindowSnapshot(): WindowSnapshot;
}

/**
 * Live window provider. `W` is whatever reference the provider hands out for a window.
 *
 * `discover` returns, in provider order, every window whose snapshot satisfies the
 * predicate within the given mode.
 */
export interface WindowSource<W> extends ActiveWindowSource {
  snapshot(window: W): WindowSnapshot;
  discover(predicate: Predicate, mode: DiscoveryMode): readonly W[];
}
