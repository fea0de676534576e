// Door Controller — opens and closes every sliding door assembly in a container.
// Each assembly holds a left and a right panel model; panels slide in
// opposite directions along the config's open offset.
//
// Concurrent open/close on the same assemblies is not coordinated: whichever
// tween starts last on a part wins (the engine supersedes the older one).

import { animateDisplacement } from './displacement';
import { emit } from './events';
import { resolveDoorConfig, sampleCloseDuration } from '../config/door';
import { negateVec3 } from '../types/index';
import type {
  AnimationEngine,
  DoorConfig,
  DoorRunResult,
  EasingProfile,
  InterpolationTask,
  PanelSide,
  SceneGraph,
  Vec3,
} from '../types/index';

// --------------- Types ---------------

export interface DoorControllerOptions<Node, Part> {
  scene: SceneGraph<Node, Part>;
  engine: AnimationEngine<Part>;
  config?: Partial<DoorConfig>;
  /** Uniform source in [0, 1) for close durations (default Math.random) */
  random?: () => number;
}

export interface DoorController<Node, Part> {
  readonly config: DoorConfig;
  open(container: Node, duration: number): DoorRunResult<Part>;
  close(container: Node): DoorRunResult<Part>;
}

interface PanelMove {
  displacement: Vec3;
  duration: number;
}

interface AssemblyPlan {
  left: PanelMove;
  right: PanelMove;
  easing: EasingProfile;
}

// --------------- Factory ---------------

export function createDoorController<Node, Part>(
  options: DoorControllerOptions<Node, Part>,
): DoorController<Node, Part> {
  const { scene, engine } = options;
  const config = resolveDoorConfig(options.config);
  const random = options.random ?? Math.random;

  function isAssembly(node: Node): boolean {
    return scene.isModel(node) && scene.getName(node) === config.assemblyName;
  }

  /**
   * Shared pass over the container. `plan` is called once per assembly
   * whose panels both resolve, so close samples fresh durations each time.
   */
  function run(
    container: Node,
    plan: () => AssemblyPlan,
    report: (assemblyName: string, tasks: InterpolationTask<Part>[], p: AssemblyPlan) => void,
  ): DoorRunResult<Part> {
    const result: DoorRunResult<Part> = { tasks: [], assembliesProcessed: 0, aborted: false };

    for (const assembly of scene.getChildren(container)) {
      if (!isAssembly(assembly)) continue;

      const assemblyName = scene.getName(assembly);
      const leftPanel = scene.findFirstChild(assembly, config.leftPanelName);
      const rightPanel = scene.findFirstChild(assembly, config.rightPanelName);

      if (!leftPanel || !rightPanel) {
        const missing: PanelSide[] = [];
        if (!leftPanel) missing.push('left');
        if (!rightPanel) missing.push('right');
        console.warn(
          `[doors] ${config.leftPanelName} or ${config.rightPanelName} not found in ${assemblyName}`,
        );
        emit({ type: 'panelMissing', assemblyName, missing });
        if (config.missingPanelPolicy === 'abort') {
          result.aborted = true;
          return result;
        }
        continue;
      }

      const p = plan();
      const deps = { scene, engine };
      const leftTasks = animateDisplacement(
        deps, leftPanel, p.left.displacement, p.left.duration, p.easing.style, p.easing.direction,
      );
      const rightTasks = animateDisplacement(
        deps, rightPanel, p.right.displacement, p.right.duration, p.easing.style, p.easing.direction,
      );

      // Start this assembly before visiting the next one
      const tasks = [...leftTasks, ...rightTasks];
      for (const task of tasks) {
        task.start();
      }

      result.tasks.push(...tasks);
      result.assembliesProcessed++;
      report(assemblyName, tasks, p);
    }

    return result;
  }

  function open(container: Node, duration: number): DoorRunResult<Part> {
    if (!Number.isFinite(duration) || duration <= 0) {
      throw new RangeError(`[doors] open duration must be a positive number, got ${duration}`);
    }
    const plan = (): AssemblyPlan => ({
      left: { displacement: config.openOffset, duration },
      right: { displacement: negateVec3(config.openOffset), duration },
      easing: config.openEasing,
    });
    return run(container, plan, (assemblyName, tasks) => {
      emit({ type: 'doorsOpened', assemblyName, taskCount: tasks.length, duration });
    });
  }

  function close(container: Node): DoorRunResult<Part> {
    const plan = (): AssemblyPlan => ({
      left: { displacement: negateVec3(config.openOffset), duration: sampleCloseDuration(config.close, random) },
      right: { displacement: config.openOffset, duration: sampleCloseDuration(config.close, random) },
      easing: config.close.easing,
    });
    return run(container, plan, (assemblyName, tasks, p) => {
      emit({
        type: 'doorsClosed',
        assemblyName,
        taskCount: tasks.length,
        leftDuration: p.left.duration,
        rightDuration: p.right.duration,
      });
    });
  }

  return { config, open, close };
}
