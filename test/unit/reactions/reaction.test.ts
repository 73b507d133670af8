import { describe, it, expect } from 'vitest';
import { Phase } from 'types';
import { ValidationError } from 'src/errors';
import { Molecule } from 'src/molecule/molecule';
import { parseEquation } from 'src/parsers/equation-parser';
import { Reaction } from 'src/reactions/reaction';

const waterFormation = () => new Reaction({ name: 'water formation' }).addReactant('H2').addReactant('O2').addProduct('H2O');

describe('Reaction', () => {
  describe('components', () => {
    it('keeps components in insertion order', () => {
      const reaction = waterFormation();
      expect(reaction.getReactants().map(c => c.label)).toEqual(['H2', 'O2']);
      expect(reaction.getProducts().map(c => c.label)).toEqual(['H2O']);
    });

    it('separates catalysts from reacting species', () => {
      const reaction = new Reaction().addReactant('H2O2', 2).addReactant('MnO2', 1, undefined, true).addProduct('H2O', 2).addProduct('O2');
      expect(reaction.getReactants().length).toBe(2);
      expect(reaction.getReactants(false).map(c => c.label)).toEqual(['H2O2']);
      expect(reaction.getCatalysts().map(c => c.label)).toEqual(['MnO2']);
    });

    it('accepts molecule instances', () => {
      const reaction = new Reaction().addReactant(new Molecule({ Na: 1, Cl: 1 })).addProduct('Na').addProduct('Cl2');
      expect(reaction.getReactants()[0]?.label).toBe('ClNa');
    });

    it('rejects non-positive coefficients', () => {
      expect(() => new Reaction().addReactant('H2', 0)).toThrow(
        "Validation failed for 'coefficient': must be a positive finite number",
      );
      expect(() => new Reaction().addProduct('H2', Number.NaN)).toThrow(ValidationError);
    });
  });

  describe('element balance', () => {
    it('reports products minus reactants per element', () => {
      const reaction = waterFormation();
      expect(reaction.getElementBalance()).toEqual({ H: 0, O: -1 });
      expect(reaction.isBalanced()).toBe(false);
      expect(reaction.getUnbalancedElements()).toEqual({ O: -1 });
    });

    it('ignores catalysts', () => {
      const reaction = new Reaction().addReactant('H2O2', 2).addReactant('MnO2', 1, undefined, true).addProduct('H2O', 2).addProduct('O2');
      expect(reaction.getElementBalance()).toEqual({ H: 0, O: 0 });
      expect(reaction.isBalanced()).toBe(true);
    });

    it('honors the tolerance argument', () => {
      const reaction = new Reaction().addReactant('H2', 1.0000001).addProduct('H2');
      expect(reaction.isBalanced()).toBe(true);
      expect(reaction.isBalanced(1e-9)).toBe(false);
    });

    it('computes the mass balance', () => {
      expect(waterFormation().getMolecularWeightBalance()).toBeCloseTo(18.015 - (2.016 + 31.998), 9);
    });
  });

  describe('balance', () => {
    it('sets integer coefficients', () => {
      const reaction = waterFormation();
      expect(reaction.balance()).toBe(true);
      expect(reaction.getReactants().map(c => c.coefficient)).toEqual([2, 1]);
      expect(reaction.getProducts().map(c => c.coefficient)).toEqual([2]);
      expect(reaction.toString()).toBe('2 H2 + O2 → 2 H2O');
    });

    it('leaves an already balanced reaction untouched', () => {
      const reaction = parseEquation('4H2 + 2O2 -> 4H2O');
      const version = reaction.version;
      expect(reaction.balance()).toBe(true);
      expect(reaction.version).toBe(version);
      expect(reaction.getReactants().map(c => c.coefficient)).toEqual([4, 2]);
    });

    it('keeps catalyst coefficients', () => {
      const reaction = new Reaction().addReactant('H2O2').addReactant('MnO2', 1, undefined, true).addProduct('H2O').addProduct('O2');
      reaction.balance();
      expect(reaction.toString()).toBe('2 H2O2 → 2 H2O + O2 [catalyst: MnO2]');
    });
  });

  describe('coefficient operations', () => {
    it('scales every non-catalyst coefficient', () => {
      const reaction = waterFormation();
      reaction.balance();
      reaction.scaleCoefficients(0.5);
      expect(reaction.toString()).toBe('H2 + 0.5 O2 → H2O');
    });

    it('rejects invalid scale factors', () => {
      expect(() => waterFormation().scaleCoefficients(0)).toThrow("Validation failed for 'factor': must be a positive finite number");
      expect(() => waterFormation().scaleCoefficients(-2)).toThrow(ValidationError);
    });

    it('normalizes fractional coefficients to the smallest integers', () => {
      const reaction = new Reaction().addReactant('H2', 1).addReactant('O2', 0.5).addProduct('H2O', 1);
      reaction.normalizeCoefficients();
      expect(reaction.toString()).toBe('2 H2 + O2 → 2 H2O');

      const scaled = new Reaction().addReactant('H2', 6).addReactant('O2', 3).addProduct('H2O', 6);
      scaled.normalizeCoefficients();
      expect(scaled.toString()).toBe('2 H2 + O2 → 2 H2O');
    });

    it('does nothing when normalizing an empty reaction', () => {
      const reaction = new Reaction();
      reaction.normalizeCoefficients();
      expect(reaction.version).toBe(0);
    });
  });

  describe('reverse', () => {
    it('swaps sides and keeps catalysts on the reactant side', () => {
      const reaction = new Reaction({ name: 'peroxide decomposition', temperature: 300 })
        .addReactant('H2O2', 2)
        .addReactant('MnO2', 1, undefined, true)
        .addProduct('H2O', 2)
        .addProduct('O2');
      const reversed = reaction.reverse();
      expect(reversed.name).toBe('Reverse of peroxide decomposition');
      expect(reversed.toString()).toBe('2 H2O + O2 → 2 H2O2 [catalyst: MnO2] [T=300K]');
      expect(reaction.toString()).toBe('2 H2O2 → 2 H2O + O2 [catalyst: MnO2] [T=300K]');
    });

    it('leaves the name unset for unnamed reactions', () => {
      expect(parseEquation('H2 + Cl2 -> 2HCl').reverse().name).toBeUndefined();
    });
  });

  describe('phases', () => {
    it('assigns one phase per side or one per component', () => {
      const reaction = waterFormation();
      reaction.balance();
      reaction.setPhases(Phase.GAS, [Phase.LIQUID]);
      expect(reaction.toString()).toBe('2 H2(g) + O2(g) → 2 H2O(l)');
    });

    it('rejects a phase list of the wrong length', () => {
      expect(() => waterFormation().setPhases(undefined, [Phase.LIQUID, Phase.GAS])).toThrow(
        "Validation failed for 'productPhases': expected 1 phases, got 2",
      );
    });

    it('falls back to the molecule phase', () => {
      const reaction = new Reaction().addReactant(Molecule.fromFormula('H2O').withPhase(Phase.SOLID)).addProduct('H2O', 1, Phase.LIQUID);
      expect(reaction.toString()).toBe('H2O(s) → H2O(l)');
    });
  });

  describe('toString', () => {
    it('renders empty reactions and empty sides', () => {
      expect(new Reaction().toString()).toBe('Empty reaction');
      expect(new Reaction().addReactant('H2').toString()).toBe('H2 → ∅');
      expect(new Reaction().addProduct('H2').toString()).toBe('∅ → H2');
    });

    it('renders conditions after the equation', () => {
      const reaction = new Reaction({ temperature: 298.15, pressure: 1, conditions: { solvent: 'water', rpm: 300 } })
        .addReactant('N2')
        .addReactant('H2', 3)
        .addProduct('NH3', 2);
      expect(reaction.toString()).toBe('N2 + 3 H2 → 2 NH3 [T=298.15K, P=1atm, solvent=water, rpm=300]');
    });

    it('rounds coefficients to three significant digits', () => {
      const reaction = new Reaction().addReactant('O2', 1 / 3).addProduct('O2', 2.5);
      expect(reaction.toString()).toBe('0.333 O2 → 2.5 O2');
    });
  });

  describe('caching', () => {
    it('bumps the version on every mutation', () => {
      const reaction = new Reaction();
      expect(reaction.version).toBe(0);
      reaction.addReactant('H2').addReactant('O2');
      expect(reaction.version).toBe(2);
      reaction.addProduct('H2O');
      reaction.balance();
      expect(reaction.version).toBe(4);
    });

    it('recomputes the analysis after a change', () => {
      const reaction = new Reaction().addReactant('H2').addReactant('O2').addProduct('H2O');
      const first = reaction.analyze();
      expect(reaction.analyze()).toBe(first);
      reaction.balance();
      expect(reaction.analyze()).not.toBe(first);
    });

    it('hands out a frozen classification', () => {
      const reaction = parseEquation('H2 + F2 -> 2HF');
      const { confidenceScores } = reaction.classify();
      expect(Object.isFrozen(reaction.analyze())).toBe(true);
      expect(Object.isFrozen(reaction.classify())).toBe(true);
      expect(() => {
        confidenceScores.decomposition = 1;
      }).toThrow(TypeError);
      expect(reaction.classify()).toEqual({ confidenceScores: { synthesis: 0.8, redox: 0.95 }, primaryType: 'redox' });
    });

    it('hands out copies of the element balance', () => {
      const reaction = waterFormation();
      const balance = reaction.getElementBalance();
      balance.O = 100;
      expect(reaction.getElementBalance()).toEqual({ H: 0, O: -1 });
    });
  });

  describe('serialization', () => {
    it('writes a plain object', () => {
      const reaction = parseEquation('2 H2(g) + O2(g) -> 2 H2O(l)', { name: 'combustion of hydrogen', pressure: 1 });
      expect(reaction.toDict()).toEqual({
        name: 'combustion of hydrogen',
        reactants: [
          { formula: 'H2', coefficient: 2, phase: 'g', charge: 0, isCatalyst: false },
          { formula: 'O2', coefficient: 1, phase: 'g', charge: 0, isCatalyst: false },
        ],
        products: [{ formula: 'H2O', coefficient: 2, phase: 'l', charge: 0 }],
        temperature: null,
        pressure: 1,
        conditions: {},
        balanced: true,
      });
    });

    it('round-trips through toDict and fromDict', () => {
      const reaction = parseEquation('Ce^4+ + Fe^2+ -> Fe^3+ + Ce^3+', { temperature: 298 });
      const restored = Reaction.fromDict(reaction.toDict());
      expect(restored.toString()).toBe('Ce⁴⁺ + Fe²⁺ → Fe³⁺ + Ce³⁺ [T=298K]');
      expect(restored.temperature).toBe(298);
      expect(restored.name).toBeUndefined();
    });

    it('keeps phases carried by the molecules themselves', () => {
      const species = (formula: string, phase: Phase) => Molecule.fromFormula(formula).withPhase(phase);
      const reaction = new Reaction()
        .addReactant(species('AgNO3', Phase.AQUEOUS))
        .addReactant(species('NaCl', Phase.AQUEOUS))
        .addProduct(species('AgCl', Phase.SOLID))
        .addProduct(species('NaNO3', Phase.AQUEOUS));
      expect(reaction.toDict().products).toEqual([
        { formula: 'AgCl', coefficient: 1, phase: 's', charge: 0 },
        { formula: 'NaNO3', coefficient: 1, phase: 'aq', charge: 0 },
      ]);

      const restored = Reaction.fromDict(reaction.toDict());
      expect(restored.toString()).toBe('AgNO3(aq) + NaCl(aq) → AgCl(s) + NaNO3(aq)');
      expect(restored.classify()).toEqual(reaction.classify());
      expect(restored.type).toBe('precipitation');
    });

    it('applies defaults and reads charges from formulas', () => {
      const reaction = Reaction.fromDict({
        reactants: [{ formula: 'Fe^2+' }, { formula: 'Pt', isCatalyst: true }],
        products: [{ formula: 'Fe', charge: 3 }],
      });
      expect(reaction.toString()).toBe('Fe²⁺ → Fe³⁺ [catalyst: Pt]');
    });

    it('rejects malformed payloads with the offending path', () => {
      try {
        Reaction.fromDict({ reactants: [{ formula: 'H2', coefficient: -1 }] });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (!(error instanceof ValidationError)) return;
        expect(error.field).toBe('reactants.0.coefficient');
      }
      expect(() => Reaction.fromDict('H2 -> H2')).toThrow(ValidationError);
    });
  });
});
