// three.js adapter + tween engine end to end. Object3D math runs fine
// headless; nothing here touches a renderer.

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as THREE from 'three';
import { ThreeSceneGraph } from '../src/engine/sceneGraph';
import { TweenEngine } from '../src/engine/tween';
import { createDoorController } from '../src/engine/doorController';
import { clearAllListeners } from '../src/engine/events';
import { buildDoorAssembly, disposeDoorAssembly, ANCHOR_NAME } from '../src/entities/doorAssembly';

// --------------- Helpers ---------------

function worldZ(scene: ThreeSceneGraph, mesh: THREE.Mesh): number {
  return scene.getPosition(mesh).z;
}

function meshNamed(panel: THREE.Object3D, name: string): THREE.Mesh {
  const found = panel.getObjectByName(name);
  if (!(found instanceof THREE.Mesh)) throw new Error(`no mesh ${name}`);
  return found;
}

function makeContainer() {
  const container = new THREE.Group();
  container.name = 'Doors';
  const door = buildDoorAssembly({ position: { x: 10, y: 0, z: 0 } });
  container.add(door.group);
  return { container, door };
}

// --------------- Tests ---------------

describe('ThreeSceneGraph', () => {
  const scene = new ThreeSceneGraph();

  it('treats groups as models and meshes as parts', () => {
    const { door } = makeContainer();
    expect(scene.isModel(door.group)).toBe(true);
    expect(scene.isModel(door.left)).toBe(true);
    expect(scene.isModel(door.meshes[0])).toBe(false);
  });

  it('finds panels by name among direct children', () => {
    const { door } = makeContainer();
    expect(scene.findFirstChild(door.group, 'LeftPanel')).toBe(door.left);
    expect(scene.findFirstChild(door.group, 'RightPanel')).toBe(door.right);
    expect(scene.findFirstChild(door.group, ANCHOR_NAME)).toBeUndefined();
  });

  it('lists every mesh under a panel, nested groups included', () => {
    const { door } = makeContainer();
    const trim = new THREE.Group();
    const bolt = new THREE.Mesh(new THREE.BoxGeometry(0.1, 0.1, 0.1));
    bolt.name = 'Bolt';
    trim.add(bolt);
    door.left.add(trim);

    expect(scene.getRigidParts(door.left).map((m) => m.name)).toEqual(['Slab', 'Window', 'Handle', 'Bolt']);
  });

  it('resolves the anchor from userData', () => {
    const { door } = makeContainer();
    expect(scene.getAnchor(door.left)?.name).toBe(ANCHOR_NAME);

    delete door.left.userData.anchor;
    expect(scene.getAnchor(door.left)).toBeUndefined();

    door.left.userData.anchor = 'NoSuchMesh';
    expect(scene.getAnchor(door.left)).toBeUndefined();
  });

  it('reads world positions', () => {
    const { door } = makeContainer();
    const slab = meshNamed(door.left, 'Slab');
    const p = scene.getPosition(slab);
    expect(p.x).toBeCloseTo(10, 6);
    expect(p.y).toBeCloseTo(1.8, 6);
    expect(p.z).toBeCloseTo(1.3, 6);
  });

  it('writes world positions back into the parent frame', () => {
    const { door } = makeContainer();
    const slab = meshNamed(door.right, 'Slab');

    scene.setPosition(slab, { x: 10, y: 1.8, z: -3.9 });

    expect(slab.position.x).toBeCloseTo(0, 6);
    expect(slab.position.y).toBeCloseTo(0, 6);
    expect(slab.position.z).toBeCloseTo(-2.6, 6);
  });
});

describe('Sliding doors end to end', () => {
  beforeEach(() => {
    clearAllListeners();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('opens and closes a built door', () => {
    const scene = new ThreeSceneGraph();
    const engine = new TweenEngine(scene);
    const doors = createDoorController({ scene, engine, random: () => 0 });
    const { container, door } = makeContainer();
    const leftSlab = meshNamed(door.left, 'Slab');
    const rightSlab = meshNamed(door.right, 'Slab');
    const leftHandle = meshNamed(door.left, 'Handle');

    const opened = doors.open(container, 2);
    expect(opened.tasks).toHaveLength(6);
    expect(engine.activeCount()).toBe(6);

    engine.update(1);   // cubic in/out at the midpoint → half way
    expect(worldZ(scene, leftSlab)).toBeCloseTo(2.6, 6);
    expect(worldZ(scene, rightSlab)).toBeCloseTo(-2.6, 6);

    engine.update(1);
    expect(worldZ(scene, leftSlab)).toBeCloseTo(3.9, 6);
    expect(worldZ(scene, rightSlab)).toBeCloseTo(-3.9, 6);
    expect(worldZ(scene, leftHandle)).toBeCloseTo(2.85, 6);
    expect(engine.activeCount()).toBe(0);

    const closed = doors.close(container);
    expect(closed.tasks.every((t) => t.duration === 3)).toBe(true);

    engine.update(3);
    expect(worldZ(scene, leftSlab)).toBeCloseTo(1.3, 6);
    expect(worldZ(scene, rightSlab)).toBeCloseTo(-1.3, 6);
    expect(worldZ(scene, leftHandle)).toBeCloseTo(0.25, 6);
  });

  it('closing mid-open supersedes the open tweens', () => {
    const scene = new ThreeSceneGraph();
    const engine = new TweenEngine(scene);
    const doors = createDoorController({ scene, engine, random: () => 0 });
    const { container, door } = makeContainer();
    const leftSlab = meshNamed(door.left, 'Slab');

    const opened = doors.open(container, 2);
    engine.update(1);   // left slab at z = 2.6
    doors.close(container);

    expect(opened.tasks.every((t) => t.state === 'superseded')).toBe(true);
    expect(engine.activeCount()).toBe(6);

    engine.update(3);
    expect(worldZ(scene, leftSlab)).toBeCloseTo(0, 6);
  });

  it('moves only the panel that has an anchor', () => {
    const scene = new ThreeSceneGraph();
    const engine = new TweenEngine(scene);
    const doors = createDoorController({ scene, engine });
    const { container, door } = makeContainer();
    delete door.left.userData.anchor;

    const result = doors.open(container, 1);
    engine.update(1);

    expect(result.tasks.map((t) => t.part.name)).toEqual(['Slab', 'Window', 'Handle']);
    expect(worldZ(scene, meshNamed(door.left, 'Slab'))).toBeCloseTo(1.3, 6);
    expect(worldZ(scene, meshNamed(door.right, 'Slab'))).toBeCloseTo(-3.9, 6);
  });

  it('disposeDoorAssembly detaches the door', () => {
    const { container, door } = makeContainer();
    disposeDoorAssembly(door);
    expect(container.children).toHaveLength(0);
  });
});
