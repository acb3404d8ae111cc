import fs from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { CombatCommand } from '../src/bridge/commands.ts';
import { PuzzleSession } from '../src/game/PuzzleSession.ts';
import { createSeededRandom, randomIndex } from '../src/lib/random.ts';
import type { SwapRequest } from '../src/puzzle/swap.ts';

interface SimulationRow {
  seed: number;
  swaps: number;
  matches: number;
  maxCombo: number;
  mana: number;
  summons: number;
  merges: number;
  orbs: number;
  explosions: number;
}

const TICKS = 150;
const TICK_MS = 1000;
const ATTACK_EVERY = 5;

function pickSwap(random: () => number, size: number): SwapRequest {
  const horizontal = random() < 0.5;
  const x = randomIndex(random, horizontal ? size - 1 : size);
  const y = randomIndex(random, horizontal ? size : size - 1);
  return {
    from: { x, y },
    to: horizontal ? { x: x + 1, y } : { x, y: y + 1 }
  };
}

function runSeededSimulation(seed: number): SimulationRow {
  const session = new PuzzleSession({
    random: createSeededRandom(seed),
    log: () => undefined
  });
  const player = createSeededRandom(seed + 10_000);

  const row: SimulationRow = {
    seed,
    swaps: 0,
    matches: 0,
    maxCombo: 0,
    mana: 0,
    summons: 0,
    merges: 0,
    orbs: 0,
    explosions: 0
  };

  const onCommand = (command: CombatCommand): void => {
    switch (command.type) {
      case 'summonUnit':
        row.summons += 1;
        break;
      case 'mergeUnits':
        row.merges += 1;
        break;
      case 'castSkillOrb':
        row.orbs += 1;
        break;
      case 'damageAllies':
        row.explosions += 1;
        break;
      case 'grantMana':
        row.mana += command.amount;
        break;
      default:
        break;
    }
  };
  session.bus.on('command', onCommand);
  session.bus.on('combo', ({ maxCombo }) => {
    row.maxCombo = Math.max(row.maxCombo, maxCombo);
  });

  for (let tick = 1; tick <= TICKS; tick++) {
    const outcome = session.requestSwap(pickSwap(player, session.getBoard().size));
    if (outcome.accepted) {
      row.swaps += 1;
      if (outcome.matched) {
        row.matches += 1;
      }
    }
    if (tick % ATTACK_EVERY === 0) {
      session.reportAttack(1 + Math.floor(tick / 10));
    }
    session.update(TICK_MS);
  }

  session.dispose();
  return row;
}

async function main(): Promise<void> {
  const seeds = Array.from({ length: 20 }, (_, index) => index);
  const rows = seeds.map((seed) => runSeededSimulation(seed));

  const header = 'seed,swaps,matches,maxCombo,mana,summons,merges,orbs,explosions';
  const lines = rows.map((row) =>
    [
      row.seed,
      row.swaps,
      row.matches,
      row.maxCombo,
      row.mana.toFixed(1),
      row.summons,
      row.merges,
      row.orbs,
      row.explosions
    ].join(',')
  );
  const csv = [header, ...lines].join('\n');

  const balancePath = join(tmpdir(), 'puzzle-balance.csv');
  await fs.writeFile(balancePath, csv, 'utf8');
  console.log(`Puzzle balance snapshot saved to ${balancePath}`);
}

void main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
