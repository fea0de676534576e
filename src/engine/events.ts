// Event Bus — lightweight pub/sub for door events
// The controller and tween engine emit at key moments (panels started,
// diagnostics, tweens finishing). Hosts subscribe to react (audio, UI,
// telemetry) without the orchestration code knowing about them.

import type { PanelSide, Vec3 } from '../types/index';

// ─── Event Types ───

export type DoorEvent =
  | { type: 'anchorMissing'; modelName: string }
  | { type: 'panelMissing'; assemblyName: string; missing: PanelSide[] }
  | { type: 'doorsOpened'; assemblyName: string; taskCount: number; duration: number }
  | { type: 'doorsClosed'; assemblyName: string; taskCount: number; leftDuration: number; rightDuration: number }
  | { type: 'tweenCompleted'; part: unknown; target: Vec3 };

// ─── Bus Implementation ───

type EventType = DoorEvent['type'];
type ListenerFn = (event: DoorEvent) => void;

const listeners: Map<EventType, Set<ListenerFn>> = new Map();

// Listeners registered during an emit hear from the next one
export function emit(event: DoorEvent): void {
  const set = listeners.get(event.type);
  if (!set) return;
  for (const fn of [...set]) {
    fn(event);
  }
}

export function on(type: EventType, callback: ListenerFn): void {
  let set = listeners.get(type);
  if (!set) {
    set = new Set();
    listeners.set(type, set);
  }
  set.add(callback);
}

export function off(type: EventType, callback: ListenerFn): void {
  const set = listeners.get(type);
  if (set) {
    set.delete(callback);
  }
}

// Clear all listeners — call between scenes or tests
export function clearAllListeners(): void {
  listeners.clear();
}
