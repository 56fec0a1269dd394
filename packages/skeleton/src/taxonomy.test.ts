/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect } from 'vitest';
import { isPipelineError } from '@rigkit/data';
import { CanonicalBoneTaxonomy, loadDefaultTaxonomy, loadTaxonomyFile } from './taxonomy.js';
import { VOCABULARIES } from './types.js';

function errorOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

function bone(name: string, parent: string | null, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return { name, parent, restOffset: [0, 0, 0], channels: ['Xrotation'], ...extra };
}

describe('CanonicalBoneTaxonomy', () => {
  describe('default table', () => {
    const taxonomy = loadDefaultTaxonomy();

    it('should load 24 bones rooted at hips', () => {
      expect(taxonomy.size).toBe(24);
      expect(taxonomy.root.name).toBe('hips');
      expect(taxonomy.totalDof).toBe(67);
      expect(taxonomy.get('hips')?.jointType).toBe('fixed');
      expect(taxonomy.get('hips')?.dof).toBe(6);
    });

    it('should derive children in table order', () => {
      expect(taxonomy.get('hips')?.children).toEqual(['spine', 'leftUpperLeg', 'rightUpperLeg']);
      expect(taxonomy.get('head')?.children).toEqual(['jaw', 'leftEye', 'rightEye']);
      expect(taxonomy.get('leftHand')?.children).toEqual([]);
    });

    it('should carry limits and rest offsets', () => {
      expect(taxonomy.get('jaw')?.limits).toEqual({ x: { min: 0, max: 30 } });
      expect(taxonomy.get('jaw')?.restTransform).toEqual({
        translation: [0, -0.03, -0.02],
        rotation: [0, 0, 0, 1],
        scale: [1, 1, 1],
      });
    });

    it('should keep alias strings unique within each vocabulary', () => {
      for (const vocabulary of VOCABULARIES) {
        const aliases = taxonomy.bones.flatMap((b) => b.aliases[vocabulary]);
        expect(new Set(aliases).size).toBe(aliases.length);
      }
    });

    it('should reach the root from every bone within size steps', () => {
      for (const start of taxonomy.bones) {
        let current = start;
        let steps = 0;
        while (current.parent !== null && steps <= taxonomy.size) {
          const parent = taxonomy.get(current.parent);
          if (parent === undefined) break;
          current = parent;
          steps++;
        }
        expect(current.name).toBe('hips');
        expect(steps).toBeLessThan(taxonomy.size);
      }
    });

    it('should resolve a rig-tool name and a mocap name to the same bone', () => {
      const fromRigTool = taxonomy.resolve('rigTool', 'CC_Base_L_Upperarm');
      const fromMocap = taxonomy.resolve('mocap', 'LeftArm');
      expect(fromRigTool?.name).toBe('leftUpperArm');
      expect(fromRigTool).toBe(fromMocap);
    });

    it('should look aliases up exactly', () => {
      expect(taxonomy.resolve('mocap', 'leftarm')).toBeUndefined();
      expect(taxonomy.resolve('rigTool', 'LeftArm')).toBeUndefined();
    });

    it('should try vocabularies in the given order', () => {
      const match = taxonomy.resolveAny('J_Bip_L_Hand', ['humanoid', 'vroid']);
      expect(match?.bone.name).toBe('leftHand');
      expect(match?.vocabulary).toBe('vroid');
      expect(taxonomy.resolveAny('J_Bip_L_Hand', ['humanoid', 'mocap'])).toBeUndefined();
    });
  });

  describe('fromTable', () => {
    it('should reject an alias naming two bones in one vocabulary', () => {
      const error = errorOf(() =>
        CanonicalBoneTaxonomy.fromTable({
          bones: [
            bone('hips', null, { aliases: { mocap: ['Spine'] } }),
            bone('spine', 'hips', { aliases: { mocap: ['Spine'] } }),
          ],
        })
      );
      expect(isPipelineError(error, 'AmbiguousBoneAlias')).toBe(true);
      expect(error instanceof Error ? error.message : '').toBe('Alias "Spine" in mocap names both "hips" and "spine"');
    });

    it('should allow the same alias in different vocabularies', () => {
      const taxonomy = CanonicalBoneTaxonomy.fromTable({
        bones: [bone('hips', null, { aliases: { mocap: ['Hips'], rigTool: ['Hips'] } })],
      });
      expect(taxonomy.resolve('rigTool', 'Hips')?.name).toBe('hips');
    });

    it('should reject a parent cycle', () => {
      const error = errorOf(() =>
        CanonicalBoneTaxonomy.fromTable({
          bones: [bone('hips', null), bone('a', 'b'), bone('b', 'a')],
        })
      );
      expect(isPipelineError(error, 'CyclicHierarchy')).toBe(true);
    });

    it('should reject structural problems as MalformedTaxonomy', () => {
      const tables: unknown[] = [
        null,
        { bones: [] },
        { bones: [bone('hips', null), bone('hips', null)] },
        { bones: [bone('hips', null), bone('spine', 'pelvis')] },
        { bones: [bone('hips', null), bone('other', null)] },
        { bones: [bone('pelvis', null)] },
        { bones: [bone('hips', null, { limits: { x: [10, -10] } })] },
        { bones: [bone('hips', null, { channels: ['Wrotation'] })] },
        { bones: [bone('hips', null, { aliases: { bvh: ['Hips'] } })] },
        { bones: [bone('hips', null, { jointType: 'ball' })] },
      ];
      for (const table of tables) {
        expect(isPipelineError(errorOf(() => CanonicalBoneTaxonomy.fromTable(table)), 'MalformedTaxonomy')).toBe(true);
      }
    });

    it('should reject keys other than bones at the top level', () => {
      const error = errorOf(() =>
        CanonicalBoneTaxonomy.fromTable({ vocabularies: ['humanoid'], bones: [bone('hips', null)] })
      );
      expect(isPipelineError(error, 'MalformedTaxonomy')).toBe(true);
      expect(error instanceof Error ? error.message : '').toBe('Taxonomy has unknown key "vocabularies"');
    });

    it('should place the default rest pose upright along +Y', () => {
      const taxonomy = loadDefaultTaxonomy();
      expect(taxonomy.get('hips')?.restTransform.translation).toEqual([0, 0.9, 0]);
      expect(taxonomy.get('spine')?.restTransform.translation).toEqual([0, 0.15, 0]);
      expect(taxonomy.get('leftLowerLeg')?.restTransform.translation).toEqual([0, -0.4, 0]);
    });

    it('should count DOF from channels', () => {
      const taxonomy = CanonicalBoneTaxonomy.fromTable({
        bones: [bone('hips', null, { channels: ['Xposition', 'Yrotation'] }), bone('spine', 'hips')],
      });
      expect(taxonomy.totalDof).toBe(3);
      expect(taxonomy.get('spine')?.jointType).toBe('revolute');
    });
  });

  describe('loadTaxonomyFile', () => {
    it('should report invalid JSON as MalformedTaxonomy', () => {
      const dir = mkdtempSync(join(tmpdir(), 'rigkit-taxonomy-'));
      try {
        const path = join(dir, 'broken.json');
        writeFileSync(path, '{"bones": [');
        expect(isPipelineError(errorOf(() => loadTaxonomyFile(path)), 'MalformedTaxonomy')).toBe(true);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });
});
