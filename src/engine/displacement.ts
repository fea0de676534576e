// Displacement Animator — slides every rigid part under a model by one offset.
// Builds the tasks only; nothing moves until the caller starts them.

import { emit } from './events';
import { addVec3 } from '../types/index';
import type {
  AnimationEngine,
  EasingDirection,
  EasingStyle,
  InterpolationTask,
  SceneGraph,
  Vec3,
} from '../types/index';

export interface DisplacementDeps<Node, Part> {
  scene: SceneGraph<Node, Part>;
  engine: AnimationEngine<Part>;
}

/**
 * Create one interpolation per rigid part under `model`, each targeting the
 * part's live position plus `displacement`.
 *
 * A model without an anchor part is skipped with a warning and an
 * `anchorMissing` event; the result is then empty.
 *
 * @returns tasks in traversal order, one per rigid part, none started
 */
export function animateDisplacement<Node, Part>(
  deps: DisplacementDeps<Node, Part>,
  model: Node,
  displacement: Vec3,
  duration: number,
  easingStyle: EasingStyle,
  easingDirection: EasingDirection,
): InterpolationTask<Part>[] {
  const { scene, engine } = deps;

  if (!scene.getAnchor(model)) {
    const modelName = scene.getName(model);
    console.warn(`[doors] Anchor part not set for model '${modelName}'`);
    emit({ type: 'anchorMissing', modelName });
    return [];
  }

  const tasks: InterpolationTask<Part>[] = [];
  for (const part of scene.getRigidParts(model)) {
    const target = addVec3(scene.getPosition(part), displacement);
    tasks.push(engine.createInterpolation(part, target, duration, easingStyle, easingDirection));
  }
  return tasks;
}
