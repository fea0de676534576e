export { createDoorController } from './engine/doorController';
export type { DoorController, DoorControllerOptions } from './engine/doorController';
export { animateDisplacement } from './engine/displacement';
export type { DisplacementDeps } from './engine/displacement';
export { TweenEngine, Tween } from './engine/tween';
export { getEasing, EASING_STYLES } from './engine/easing';
export { ThreeSceneGraph } from './engine/sceneGraph';
export { emit, on, off, clearAllListeners } from './engine/events';
export type { DoorEvent } from './engine/events';
export { buildDoorAssembly, disposeDoorAssembly, ANCHOR_NAME } from './entities/doorAssembly';
export type { DoorAssemblyOptions, DoorAssemblyParts } from './entities/doorAssembly';
export { DOOR_CONFIG, CLOSE_PROFILES, resolveDoorConfig, sampleCloseDuration } from './config/door';
export * from './types/index';
