// ═══════════════════════════════════════════════════════════════════════════
// VECTOR
// ═══════════════════════════════════════════════════════════════════════════

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export function addVec3(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function negateVec3(v: Vec3): Vec3 {
  // Component-wise negation; zero components come back as +0
  return { x: 0 - v.x, y: 0 - v.y, z: 0 - v.z };
}

// ═══════════════════════════════════════════════════════════════════════════
// EASING
// ═══════════════════════════════════════════════════════════════════════════

export type EasingStyle =
  | 'linear'
  | 'quad'
  | 'cubic'
  | 'quart'
  | 'quint'
  | 'sine'
  | 'exponential'
  | 'circular'
  | 'back'
  | 'bounce'
  | 'elastic';

export type EasingDirection = 'in' | 'out' | 'inOut';

export interface EasingProfile {
  style: EasingStyle;
  direction: EasingDirection;
}

export type EasingFn = (t: number) => number;

// ═══════════════════════════════════════════════════════════════════════════
// SCENE GRAPH
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Read-only view of a hierarchical scene. `Node` is any grouping entity
 * (container, assembly, panel); `Part` is a rigid, positioned leaf.
 */
export interface SceneGraph<Node, Part> {
  getChildren(node: Node): Node[];
  getName(node: Node): string;
  /** True for grouping entities that may hold panels or parts */
  isModel(node: Node): boolean;
  /** Direct child lookup by name, first match wins */
  findFirstChild(node: Node, name: string): Node | undefined;
  /** Designated reference part of a model, if one is set */
  getAnchor(model: Node): Part | undefined;
  /** Every rigid part under the model, nested models included */
  getRigidParts(model: Node): Part[];
  /** Live position, read at call time */
  getPosition(part: Part): Vec3;
}

export interface PositionAccessor<Part> {
  getPosition(part: Part): Vec3;
  setPosition(part: Part, position: Vec3): void;
}

// ═══════════════════════════════════════════════════════════════════════════
// ANIMATION
// ═══════════════════════════════════════════════════════════════════════════

export type InterpolationState = 'created' | 'playing' | 'completed' | 'superseded' | 'cancelled';

export interface InterpolationTask<Part = unknown> {
  readonly part: Part;
  readonly target: Vec3;
  readonly duration: number;   // seconds
  readonly easing: EasingProfile;
  readonly state: InterpolationState;
  start(): void;
}

export interface AnimationEngine<Part> {
  createInterpolation(
    part: Part,
    target: Vec3,
    duration: number,
    style: EasingStyle,
    direction: EasingDirection,
  ): InterpolationTask<Part>;
}

// ═══════════════════════════════════════════════════════════════════════════
// DOORS
// ═══════════════════════════════════════════════════════════════════════════

export type PanelSide = 'left' | 'right';

export type MissingPanelPolicy = 'abort' | 'skip';

export interface CloseProfile {
  minDuration: number;   // seconds
  maxDuration: number;   // seconds
  /** Integer durations in [min, max] instead of continuous [min, max) */
  wholeSeconds: boolean;
  easing: EasingProfile;
}

export interface DoorConfig {
  assemblyName: string;
  leftPanelName: string;
  rightPanelName: string;
  openOffset: Vec3;
  openEasing: EasingProfile;
  close: CloseProfile;
  missingPanelPolicy: MissingPanelPolicy;
}

export interface DoorRunResult<Part = unknown> {
  tasks: InterpolationTask<Part>[];
  assembliesProcessed: number;
  /** True when a missing panel stopped the loop early */
  aborted: boolean;
}
