// three.js scene adapter — exposes an Object3D hierarchy to the door controller.
// Groups are models, meshes are rigid parts. A model's anchor is the
// descendant mesh named by `model.userData.anchor`.
// Positions are world-space; writes are mapped back into the parent's frame.

import * as THREE from 'three';
import type { PositionAccessor, SceneGraph, Vec3 } from '../types/index';

const _scratch = new THREE.Vector3();

export class ThreeSceneGraph
  implements SceneGraph<THREE.Object3D, THREE.Mesh>, PositionAccessor<THREE.Mesh>
{
  getChildren(node: THREE.Object3D): THREE.Object3D[] {
    return [...node.children];
  }

  getName(node: THREE.Object3D): string {
    return node.name;
  }

  isModel(node: THREE.Object3D): boolean {
    return node instanceof THREE.Group;
  }

  findFirstChild(node: THREE.Object3D, name: string): THREE.Object3D | undefined {
    return node.children.find((child) => child.name === name);
  }

  getAnchor(model: THREE.Object3D): THREE.Mesh | undefined {
    const anchorName: unknown = model.userData.anchor;
    if (typeof anchorName !== 'string' || anchorName === '') return undefined;
    return this.getRigidParts(model).find((part) => part.name === anchorName);
  }

  getRigidParts(model: THREE.Object3D): THREE.Mesh[] {
    const parts: THREE.Mesh[] = [];
    model.traverse((obj) => {
      if (obj !== model && obj instanceof THREE.Mesh) parts.push(obj);
    });
    return parts;
  }

  getPosition(part: THREE.Mesh): Vec3 {
    part.getWorldPosition(_scratch);
    return { x: _scratch.x, y: _scratch.y, z: _scratch.z };
  }

  setPosition(part: THREE.Mesh, position: Vec3): void {
    _scratch.set(position.x, position.y, position.z);
    if (part.parent) {
      part.parent.updateWorldMatrix(true, false);
      part.parent.worldToLocal(_scratch);
    }
    part.position.copy(_scratch);
  }
}
