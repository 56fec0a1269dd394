/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Material Texture Resolver - classifies material names into avatar
 * component categories and picks a texture for each
 *
 * Rules are tried in declared order; matching is a case-insensitive substring
 * test. A rule set where one category's pattern contains another category's
 * pattern is rejected when the resolver is built, since the outcome would
 * then depend on rule order alone.
 */

import { PipelineError, createLogger } from '@rigkit/data';
import type { Diagnostics } from '@rigkit/data';
import { textureFileName } from '@rigkit/container';
import type { SceneDocument } from '@rigkit/container';
import type { ComponentCategory, MaterialAssignment } from './types.js';

const log = createLogger('MaterialResolver');

export interface MaterialRule {
  category: Exclude<ComponentCategory, 'unclassified'>;
  /** Lower-case substrings of the material name */
  patterns: readonly string[];
  defaultTexture: string | null;
}

export const DEFAULT_MATERIAL_RULES: readonly MaterialRule[] = [
  { category: 'eyeHighlight', patterns: ['eyehighlight'], defaultTexture: 'texture_04.png' },
  { category: 'eyeIris', patterns: ['eyeiris'], defaultTexture: 'texture_03.png' },
  {
    category: 'detail',
    patterns: ['eyewhite', 'facebrow', 'faceeyelash', 'faceeyeline', 'facemouth'],
    defaultTexture: 'texture_00.png',
  },
  { category: 'face', patterns: ['face_00_skin', 'face_skin'], defaultTexture: 'texture_05.png' },
  { category: 'hair', patterns: ['hair'], defaultTexture: 'texture_20.png' },
  { category: 'top', patterns: ['tops', 'blouse', 'shirt'], defaultTexture: 'texture_15.png' },
  { category: 'bottom', patterns: ['bottoms', 'skirt', 'pants'], defaultTexture: 'texture_18.png' },
  { category: 'footwear', patterns: ['shoes', 'boots'], defaultTexture: 'texture_19.png' },
  { category: 'skin', patterns: ['body_00_skin', 'body_skin'], defaultTexture: 'texture_13.png' },
];

export interface MaterialResolverOptions {
  rules?: readonly MaterialRule[];
  /** Texture file name per category, replacing the rule's default */
  textureOverrides?: Partial<Record<ComponentCategory, string>>;
}

export interface Classification {
  category: ComponentCategory;
  matchedPattern: string | null;
  /** Later categories whose patterns also matched */
  alsoMatched: ComponentCategory[];
}

/**
 * @throws PipelineError(OverlappingMaterialRule) if a pattern is empty or one
 *   category's pattern contains another category's pattern
 */
function checkRules(rules: readonly MaterialRule[]): void {
  for (let a = 0; a < rules.length; a++) {
    for (const pattern of rules[a].patterns) {
      if (pattern.length === 0) {
        throw new PipelineError('OverlappingMaterialRule', `Rule for ${rules[a].category} has an empty pattern`);
      }
      if (pattern !== pattern.toLowerCase()) {
        throw new PipelineError(
          'OverlappingMaterialRule',
          `Pattern "${pattern}" for ${rules[a].category} must be lower case`
        );
      }
    }
    for (let b = a + 1; b < rules.length; b++) {
      if (rules[a].category === rules[b].category) continue;
      for (const pa of rules[a].patterns) {
        for (const pb of rules[b].patterns) {
          if (pa.includes(pb) || pb.includes(pa)) {
            throw new PipelineError(
              'OverlappingMaterialRule',
              `Pattern "${pa}" (${rules[a].category}) overlaps "${pb}" (${rules[b].category})`,
              { first: rules[a].category, second: rules[b].category }
            );
          }
        }
      }
    }
  }
}

export class MaterialResolver {
  private readonly rules: readonly MaterialRule[];
  private readonly overrides: Partial<Record<ComponentCategory, string>>;

  constructor(options: MaterialResolverOptions = {}) {
    this.rules = options.rules ?? DEFAULT_MATERIAL_RULES;
    this.overrides = options.textureOverrides ?? {};
    checkRules(this.rules);
  }

  /**
   * Classify a material name. Unnamed or unmatched materials are unclassified.
   */
  classify(materialName: string | undefined): Classification {
    if (materialName === undefined) {
      return { category: 'unclassified', matchedPattern: null, alsoMatched: [] };
    }

    const lower = materialName.toLowerCase();
    let first: { category: ComponentCategory; pattern: string } | null = null;
    const alsoMatched: ComponentCategory[] = [];

    for (const rule of this.rules) {
      const pattern = rule.patterns.find((p) => lower.includes(p));
      if (pattern === undefined) continue;
      if (first === null) {
        first = { category: rule.category, pattern };
      } else if (rule.category !== first.category && !alsoMatched.includes(rule.category)) {
        alsoMatched.push(rule.category);
      }
    }

    if (first === null) {
      return { category: 'unclassified', matchedPattern: null, alsoMatched: [] };
    }
    return { category: first.category, matchedPattern: first.pattern, alsoMatched };
  }

  /**
   * Texture suggested for a category: the configured override, else the rule default
   */
  suggestedTexture(category: ComponentCategory): string | null {
    const override = this.overrides[category];
    if (override !== undefined) return override;
    return this.rules.find((r) => r.category === category)?.defaultTexture ?? null;
  }

  /**
   * Resolve the material of a primitive
   *
   * Records AmbiguousMaterialMatch when the name matches more than one
   * category; the first rule in declared order wins.
   */
  resolve(
    doc: SceneDocument,
    materialIndex: number | undefined,
    diagnostics: Diagnostics,
    primitiveIndex?: number
  ): MaterialAssignment {
    const material = materialIndex === undefined ? undefined : doc.materials[materialIndex];
    const materialName = material?.name;
    const classification = this.classify(materialName);

    if (classification.alsoMatched.length > 0) {
      diagnostics.record(
        'AmbiguousMaterialMatch',
        `Material "${materialName ?? ''}" matches ${[classification.category, ...classification.alsoMatched].join(', ')}; using ${classification.category}`,
        { primitiveIndex, materialName }
      );
    }

    const assignment: MaterialAssignment = {
      materialName: materialName ?? (materialIndex === undefined ? '' : `material_${materialIndex}`),
      category: classification.category,
      matchedPattern: classification.matchedPattern,
      suggestedTexture: this.suggestedTexture(classification.category),
      sourceTexture: textureFileName(doc, material?.baseColorTexture),
    };

    log.debug(`"${assignment.materialName}" -> ${assignment.category}`, undefined, {
      operation: 'resolve',
      primitiveIndex,
    });
    return assignment;
  }
}
