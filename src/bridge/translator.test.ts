import { describe, expect, it } from 'vitest';
import { BridgeTranslator } from './translator.ts';
import { SummonLedger } from './ledger.ts';
import type { MatchGroup, TileCategory } from '../puzzle/types.ts';

function rowGroup(category: TileCategory, size: number, y = 0, touchesCore = false): MatchGroup {
  const cells = Array.from({ length: size }, (_, x) => ({ x, y }));
  return { category, orientation: 'horizontal', cells, size, touchesCore };
}

describe('BridgeTranslator.translateGroup', () => {
  it('summons rank 1 for a run of three', () => {
    const translator = new BridgeTranslator();
    expect(translator.translateGroup(rowGroup('red', 3))).toEqual([
      { type: 'summonUnit', unitId: 'unit-1', archetype: 'warrior', rank: 1 }
    ]);
  });

  it('adds a skill orb for a run of four', () => {
    const translator = new BridgeTranslator();
    expect(translator.translateGroup(rowGroup('blue', 4))).toEqual([
      { type: 'summonUnit', unitId: 'unit-1', archetype: 'tank', rank: 1 },
      { type: 'castSkillOrb', effect: 'attackBuff', magnitude: 1.2, source: 'blue' }
    ]);
  });

  it('summons rank 2 for a run of five', () => {
    const translator = new BridgeTranslator();
    expect(translator.translateGroup(rowGroup('green', 5))).toEqual([
      { type: 'summonUnit', unitId: 'unit-1', archetype: 'archer', rank: 2 },
      { type: 'castSkillOrb', effect: 'heal', magnitude: 0.3, source: 'green' }
    ]);
  });

  it('maps every category to its orb', () => {
    const translator = new BridgeTranslator();
    const effects = (['red', 'blue', 'green', 'yellow', 'purple'] as const).map((category) =>
      translator.translateGroup(rowGroup(category, 4)).find((command) => command.type === 'castSkillOrb')
    );
    expect(effects.map((command) => command?.type === 'castSkillOrb' && command.effect)).toEqual([
      'meteor',
      'attackBuff',
      'heal',
      'attackBuff',
      'meteor'
    ]);
  });

  it('charges a core ability for groups touching the core', () => {
    const translator = new BridgeTranslator();
    const group = rowGroup('purple', 3, 3, true);
    expect(translator.translateGroup(group)).toEqual([
      { type: 'summonUnit', unitId: 'unit-1', archetype: 'mage', rank: 1 },
      { type: 'coreAbility', archetype: 'mage', count: 3, cells: group.cells }
    ]);
  });
});

describe('BridgeTranslator.translateCascadeEvent', () => {
  it('summons once per group of a pass and merges pairs', () => {
    const translator = new BridgeTranslator();
    const horizontal = rowGroup('yellow', 3);
    const vertical: MatchGroup = {
      category: 'yellow',
      orientation: 'vertical',
      cells: [
        { x: 2, y: 0 },
        { x: 2, y: 1 },
        { x: 2, y: 2 }
      ],
      size: 3,
      touchesCore: false
    };

    const commands = translator.translateCascadeEvent({
      type: 'matchPass',
      combo: 1,
      groups: [horizontal, vertical],
      matched: []
    });

    expect(commands).toEqual([
      { type: 'summonUnit', unitId: 'unit-1', archetype: 'assassin', rank: 1 },
      { type: 'summonUnit', unitId: 'unit-2', archetype: 'assassin', rank: 1 },
      {
        type: 'mergeUnits',
        archetype: 'assassin',
        rank: 2,
        consumed: ['unit-1', 'unit-2'],
        unitId: 'unit-3'
      }
    ]);
  });

  it('grants mana for a reward and ignores combo updates', () => {
    const translator = new BridgeTranslator();
    expect(translator.translateCascadeEvent({ type: 'manaReward', amount: 15, combo: 2 })).toEqual([
      { type: 'grantMana', amount: 15 }
    ]);
    expect(translator.translateCascadeEvent({ type: 'comboChanged', combo: 2, maxCombo: 2 })).toEqual([]);
  });
});

describe('BridgeTranslator.translateObstacleEvent', () => {
  it('turns an explosion into ally damage', () => {
    const translator = new BridgeTranslator();
    expect(
      translator.translateObstacleEvent({ phase: 'exploding', cell: { x: 1, y: 1 }, kind: 'timed', damage: 10 })
    ).toEqual([{ type: 'damageAllies', amount: 10, cell: { x: 1, y: 1 } }]);
  });

  it('ignores every other phase', () => {
    const translator = new BridgeTranslator();
    expect(
      translator.translateObstacleEvent({
        phase: 'clearing',
        cell: { x: 1, y: 1 },
        kind: 'timed',
        cause: 'direct'
      })
    ).toEqual([]);
    expect(
      translator.translateObstacleEvent({ phase: 'ticking', cell: { x: 1, y: 1 }, kind: 'timed', remainingTicks: 0 })
    ).toEqual([]);
  });
});

describe('BridgeTranslator ledger', () => {
  it('uses an injected ledger and forwards releases', () => {
    const ledger = new SummonLedger();
    const translator = new BridgeTranslator({ ledger });
    translator.translateGroup(rowGroup('red', 3));

    expect(translator.getLedger()).toBe(ledger);
    expect(translator.releaseUnit('unit-1')).toBe(true);
    expect(ledger.getUnits()).toEqual([]);
  });
});
