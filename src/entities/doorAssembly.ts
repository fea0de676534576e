// DoorAssembly — procedural sliding door built from box primitives.
// Two panel groups side by side along Z, each with a slab (the anchor),
// a window inset and a handle. Names follow the door config so the
// controller can find the panels without extra wiring.

import * as THREE from 'three';
import { DOOR_CONFIG } from '../config/door';
import type { DoorConfig, Vec3 } from '../types/index';

// ─── Exported Types ───

export interface DoorAssemblyOptions {
  position?: Vec3;
  config?: Pick<DoorConfig, 'assemblyName' | 'leftPanelName' | 'rightPanelName'>;
}

export interface DoorAssemblyParts {
  group: THREE.Group;
  left: THREE.Group;
  right: THREE.Group;
  meshes: THREE.Mesh[];
}

// ─── Proportions ───

const P = {
  panelWidth: 2.6,     // along Z, equal to the default open offset
  panelHeight: 3.6,
  panelDepth: 0.2,
  windowHeight: 1.2,
  windowY: 0.7,        // above slab center
  handleSize: 0.12,
  handleInset: 0.25,   // from the meeting edge
};

// ─── Color Palette ───

const C = {
  slab: 0x4a4a6a,
  window: 0x88bbff,
  handle: 0xcccccc,
};

export const ANCHOR_NAME = 'Slab';

function buildPanel(name: string, side: 1 | -1, materials: Record<keyof typeof C, THREE.Material>): THREE.Group {
  const panel = new THREE.Group();
  panel.name = name;
  panel.userData.anchor = ANCHOR_NAME;
  // Left panel sits on +Z, right on -Z; they meet at z = 0
  panel.position.set(0, P.panelHeight / 2, side * (P.panelWidth / 2));

  const slab = new THREE.Mesh(new THREE.BoxGeometry(P.panelDepth, P.panelHeight, P.panelWidth), materials.slab);
  slab.name = ANCHOR_NAME;
  panel.add(slab);

  const glass = new THREE.Mesh(
    new THREE.BoxGeometry(P.panelDepth * 1.1, P.windowHeight, P.panelWidth * 0.6),
    materials.window,
  );
  glass.name = 'Window';
  glass.position.set(0, P.windowY, 0);
  panel.add(glass);

  const handle = new THREE.Mesh(new THREE.BoxGeometry(P.handleSize, P.handleSize * 4, P.handleSize), materials.handle);
  handle.name = 'Handle';
  handle.position.set(P.panelDepth, 0, -side * (P.panelWidth / 2 - P.handleInset));
  panel.add(handle);

  return panel;
}

export function buildDoorAssembly(options: DoorAssemblyOptions = {}): DoorAssemblyParts {
  const names = options.config ?? DOOR_CONFIG;
  const materials = {
    slab: new THREE.MeshStandardMaterial({ color: C.slab, roughness: 0.5 }),
    window: new THREE.MeshStandardMaterial({ color: C.window, transparent: true, opacity: 0.5 }),
    handle: new THREE.MeshStandardMaterial({ color: C.handle, metalness: 0.8 }),
  };

  const group = new THREE.Group();
  group.name = names.assemblyName;
  if (options.position) {
    group.position.set(options.position.x, options.position.y, options.position.z);
  }

  const left = buildPanel(names.leftPanelName, 1, materials);
  const right = buildPanel(names.rightPanelName, -1, materials);
  group.add(left, right);

  const meshes: THREE.Mesh[] = [];
  group.traverse((obj) => {
    if (obj instanceof THREE.Mesh) meshes.push(obj);
  });

  return { group, left, right, meshes };
}

export function disposeDoorAssembly(parts: DoorAssemblyParts): void {
  parts.group.removeFromParent();
  const materials = new Set<THREE.Material>();
  for (const mesh of parts.meshes) {
    mesh.geometry.dispose();
    const mat = mesh.material;
    for (const m of Array.isArray(mat) ? mat : [mat]) materials.add(m);
  }
  for (const m of materials) m.dispose();
}
