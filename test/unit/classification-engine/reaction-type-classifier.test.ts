import { describe, it, expect } from 'vitest';
import { REACTION_TYPES } from 'types';
import { ReactionTypeClassifier, pickPrimaryType } from 'src/classification-engine/reaction-type-classifier';
import { combustionRule, type ReactionRule } from 'src/classification-engine/rules';
import { resolveEngineConfig } from 'src/config/engine-config';
import { parseEquation } from 'src/parsers/equation-parser';
import type { ReactionSides } from 'src/reactions/reaction-component';

const classifier = new ReactionTypeClassifier();
const classify = (equation: string) => classifier.classify(parseEquation(equation));

describe('pickPrimaryType', () => {
  it('takes the highest score', () => {
    expect(pickPrimaryType({ synthesis: 0.45, redox: 0.95 })).toBe('redox');
  });

  it('breaks ties by the order of REACTION_TYPES', () => {
    expect(pickPrimaryType({ redox: 0.95, combustion: 0.95 })).toBe('combustion');
    expect(pickPrimaryType({ decomposition: 0.8, synthesis: 0.8 })).toBe('synthesis');
  });

  it('defaults to unknown', () => {
    expect(pickPrimaryType({})).toBe('unknown');
  });
});

describe('ReactionTypeClassifier', () => {
  it('classifies combustion ahead of the redox it implies', () => {
    expect(classify('CH4 + 2O2 -> CO2 + 2H2O')).toEqual({
      confidenceScores: { combustion: 0.95, single_replacement: 0.8, double_replacement: 0.8, redox: 0.95 },
      primaryType: 'combustion',
    });
  });

  it('prefers redox over the structural synthesis pattern', () => {
    expect(classify('H2 + F2 -> 2HF')).toEqual({
      confidenceScores: { synthesis: 0.8, redox: 0.95 },
      primaryType: 'redox',
    });
  });

  it('penalizes decomposition when electrons move', () => {
    expect(classify('2H2O -> 2H2 + O2')).toEqual({
      confidenceScores: { decomposition: 0.8, redox: 0.95 },
      primaryType: 'redox',
    });
  });

  it('classifies single replacement without a redox score', () => {
    expect(classify('Zn + CuSO4 -> ZnSO4 + Cu')).toEqual({
      confidenceScores: { single_replacement: 0.8 },
      primaryType: 'single_replacement',
    });
  });

  it('classifies neutralization', () => {
    expect(classify('HCl + NaOH -> NaCl + H2O')).toEqual({
      confidenceScores: { acid_base: 0.9, double_replacement: 0.8 },
      primaryType: 'acid_base',
    });
  });

  it('classifies peroxide decomposition as non-redox', () => {
    expect(classify('2H2O2 -> 2H2O + O2')).toEqual({
      confidenceScores: { decomposition: 0.9 },
      primaryType: 'decomposition',
    });
  });

  it('classifies ionic electron transfer', () => {
    const analysis = classifier.analyze(parseEquation('Ce^4+ + Fe^2+ -> Fe^3+ + Ce^3+'));
    expect(analysis.classification).toEqual({
      confidenceScores: { single_replacement: 0.8, redox: 0.95 },
      primaryType: 'redox',
    });
    expect(analysis.electronTransfer?.method).toBe('ionic_charges');
    expect(analysis.electronTransfer?.oxidizingAgent).toBe('Ce⁴⁺');
    expect(analysis.electronTransfer?.reducingAgent).toBe('Fe²⁺');
  });

  it('classifies precipitation', () => {
    expect(classify('AgNO3(aq) + NaCl(aq) -> AgCl(s) + NaNO3(aq)')).toEqual({
      confidenceScores: { precipitation: 0.85, double_replacement: 0.8 },
      primaryType: 'precipitation',
    });
  });

  it('classifies ester hydrolysis and reports the mechanism', () => {
    const analysis = classifier.analyze(parseEquation('CH3COOC2H5 + H2O -> CH3COOH + C2H5OH'));
    expect(analysis.classification).toEqual({
      confidenceScores: { hydrolysis: 0.85, double_replacement: 0.8 },
      primaryType: 'hydrolysis',
    });
    expect(analysis.functionalGroups?.mechanism).toBe('hydrolysis');
  });

  it('reports the esterification mechanism alongside the structural type', () => {
    const analysis = classifier.analyze(parseEquation('CH3COOH + C2H5OH -> CH3COOC2H5 + H2O'));
    expect(analysis.classification.primaryType).toBe('double_replacement');
    expect(analysis.functionalGroups?.mechanism).toBe('esterification');
  });

  it('classifies isomerization', () => {
    expect(classify('C2H5OH -> CH3OCH3')).toEqual({
      confidenceScores: { isomerization: 0.95 },
      primaryType: 'isomerization',
    });
  });

  it('falls back to unknown with a zero score', () => {
    expect(classify('3O2 -> 2O3')).toEqual({ confidenceScores: { unknown: 0 }, primaryType: 'unknown' });
  });

  it('keeps every score within [0, 1] and every key a known type', () => {
    for (const equation of ['CH4 + 2O2 -> CO2 + 2H2O', 'KMnO4 + HCl -> KCl + MnCl2 + H2O + Cl2', 'H^+ + OH^- -> H2O']) {
      const { confidenceScores } = classify(equation);
      for (const [type, score] of Object.entries(confidenceScores)) {
        expect(REACTION_TYPES).toContain(type);
        expect(score).toBeGreaterThanOrEqual(0);
        expect(score).toBeLessThanOrEqual(1);
      }
    }
  });

  it('applies the configured fallback confidence', () => {
    const custom = new ReactionTypeClassifier({
      config: resolveEngineConfig({ classification: { fallbackConfidence: 0.5 } }),
    });
    expect(custom.classify(parseEquation('H2 + F2 -> 2HF')).confidenceScores).toEqual({ synthesis: 0.5, redox: 0.95 });
  });

  it('clamps rule confidences into range', () => {
    const overconfident: ReactionRule = { ...combustionRule, confidence: 1.5 };
    const custom = new ReactionTypeClassifier({ rules: [overconfident] });
    expect(custom.classify(parseEquation('CH4 + 2O2 -> CO2 + 2H2O')).confidenceScores.combustion).toBe(1);
  });

  it('never throws; failing stages become diagnostics', () => {
    const broken: ReactionSides = {
      getReactants: () => [],
      getProducts: () => {
        throw new Error('no products');
      },
    };
    const analysis = classifier.analyze(broken);
    expect(analysis.classification).toEqual({ confidenceScores: { unknown: 0 }, primaryType: 'unknown' });
    expect(analysis.diagnostics).toEqual([
      'electron transfer: no products',
      'functional groups: no products',
      'rule engine: no products',
      'fingerprint: no products',
      'fallback: no products',
    ]);
    expect(analysis.rules).toEqual({ matches: [], failures: [] });
    expect(analysis.fallbackType).toBe('unknown');
  });
});
