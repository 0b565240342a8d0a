import fs from 'fs-extra';
import os from 'os';
import path from 'path';

export interface SnapshotWorkspace {
  dir: string;
  snapshot: string;
  config: string;
  out: string;
}

/** Document `dump` writes for the snapshot from `workspace()`. */
export const EXPECTED_DUMP = [
  '{',
  '  "Game::Player::TakeDamage(int)": {',
  '    "CallCount": 2,',
  '    "Usages": [',
  '      "Game::Enemy::Update(void)",',
  '      "Game::Enemy::Update(void)"',
  '    ]',
  '  },',
  '  "Game::Enemy::Update(void)": {',
  '    "CallCount": 0,',
  '    "Usages": []',
  '  }',
  '}',
].join('\n');

/** Temp dir holding a three-function snapshot and an empty config. */
export async function workspace(): Promise<SnapshotWorkspace> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'xref-graph-cli-'));
  const snapshot = path.join(dir, 'snapshot.json');
  const config = path.join(dir, 'xref.config.json');
  await fs.writeJSON(snapshot, {
    functions: [
      { start: '0x1000', end: '0x1100', name: '?TakeDamage@Player@Game@@QEAAXH@Z' },
      { start: '0x2000', end: '0x2100', name: '?Update@Enemy@Game@@QEAAXXZ' },
      { start: '0x3000', end: '0x3100', name: '?Foo@System@@YAXXZ' },
    ],
    references: [
      { from: '0x2010', to: '0x1000' },
      { from: '0x2040', to: '0x1000' },
      { from: '0x3020', to: '0x1000' },
      { from: '0x9000', to: '0x1000' },
    ],
    demangled: {
      msvc: {
        '?TakeDamage@Player@Game@@QEAAXH@Z': 'void Game::Player::TakeDamage(int)',
        '?Update@Enemy@Game@@QEAAXXZ': 'void Game::Enemy::Update(void)',
        '?Foo@System@@YAXXZ': 'void System::Foo(void)',
      },
    },
  });
  await fs.writeJSON(config, {});
  return { dir, snapshot, config, out: path.join(dir, 'out', 'xref_data.json') };
}
