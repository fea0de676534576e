// Tween Engine — frame-driven position interpolation.
// Tweens are created idle; start() hands them to the engine, which advances
// them every update(dt) from the host's frame loop. One tween per part:
// starting a new one supersedes whatever was playing on that part.

import { getEasing } from './easing';
import { emit } from './events';
import type {
  AnimationEngine,
  EasingDirection,
  EasingFn,
  EasingProfile,
  EasingStyle,
  InterpolationState,
  InterpolationTask,
  PositionAccessor,
  Vec3,
} from '../types/index';

function lerpVec3(a: Vec3, b: Vec3, t: number): Vec3 {
  return {
    x: a.x + (b.x - a.x) * t,
    y: a.y + (b.y - a.y) * t,
    z: a.z + (b.z - a.z) * t,
  };
}

export class Tween<Part> implements InterpolationTask<Part> {
  readonly easing: EasingProfile;
  private readonly ease: EasingFn;
  private _state: InterpolationState = 'created';
  private from: Vec3 | null = null;
  private elapsed = 0;

  constructor(
    private readonly owner: TweenEngine<Part>,
    readonly part: Part,
    readonly target: Vec3,
    readonly duration: number,
    style: EasingStyle,
    direction: EasingDirection,
  ) {
    this.easing = { style, direction };
    this.ease = getEasing(style, direction);
  }

  get state(): InterpolationState {
    return this._state;
  }

  /** Fraction of the duration elapsed, 0..1 */
  get progress(): number {
    return this.duration > 0 ? Math.min(this.elapsed / this.duration, 1) : 1;
  }

  start(): void {
    if (this._state !== 'created') return;
    this._state = 'playing';
    this.owner.play(this);
  }

  /** @internal called by the owning engine */
  begin(from: Vec3): void {
    this.from = from;
    this.elapsed = 0;
  }

  /** @internal returns the position to write this frame */
  advance(dt: number): Vec3 {
    this.elapsed += dt;
    if (this.elapsed >= this.duration || this.from === null) {
      this._state = 'completed';
      return { ...this.target };
    }
    return lerpVec3(this.from, this.target, this.ease(this.elapsed / this.duration));
  }

  /** @internal */
  stop(state: 'superseded' | 'cancelled'): void {
    if (this._state === 'playing') this._state = state;
  }
}

export class TweenEngine<Part> implements AnimationEngine<Part> {
  private readonly playing: Tween<Part>[] = [];
  private readonly byPart = new Map<Part, Tween<Part>>();

  constructor(private readonly accessor: PositionAccessor<Part>) {}

  createInterpolation(
    part: Part,
    target: Vec3,
    duration: number,
    style: EasingStyle,
    direction: EasingDirection,
  ): Tween<Part> {
    if (!Number.isFinite(duration) || duration < 0) {
      throw new RangeError(`[tween] duration must be a non-negative number, got ${duration}`);
    }
    return new Tween(this, part, { ...target }, duration, style, direction);
  }

  /** @internal called from Tween.start() */
  play(tween: Tween<Part>): void {
    const previous = this.byPart.get(tween.part);
    if (previous) {
      previous.stop('superseded');
      this.remove(previous);
    }
    tween.begin(this.accessor.getPosition(tween.part));
    this.playing.push(tween);
    this.byPart.set(tween.part, tween);
  }

  /**
   * Advance every playing tween by `dt` seconds. Call once per frame.
   * Walks a snapshot of the active list; completion events go out after
   * the pass, so listeners that start tweens take effect next frame.
   */
  update(dt: number): void {
    if (!Number.isFinite(dt) || dt < 0) {
      throw new RangeError(`[tween] dt must be a non-negative number, got ${dt}`);
    }
    const finished: Tween<Part>[] = [];
    for (const tween of [...this.playing]) {
      if (tween.state !== 'playing') continue;
      // advance() moves the state on; read it through an un-narrowed reference
      const advanced: Tween<Part> = tween;
      this.accessor.setPosition(advanced.part, advanced.advance(dt));
      if (advanced.state === 'completed') {
        this.remove(tween);
        finished.push(tween);
      }
    }
    for (const tween of finished) {
      emit({ type: 'tweenCompleted', part: tween.part, target: { ...tween.target } });
    }
  }

  /** Stop every playing tween where it stands */
  cancelAll(): void {
    for (const tween of this.playing) {
      tween.stop('cancelled');
    }
    this.playing.length = 0;
    this.byPart.clear();
  }

  activeCount(): number {
    return this.playing.length;
  }

  private remove(tween: Tween<Part>): void {
    const idx = this.playing.indexOf(tween);
    if (idx !== -1) this.playing.splice(idx, 1);
    this.byPart.delete(tween.part);
  }
}
