import test from 'node:test';
import assert from 'node:assert/strict';
import { defaultExcludedPrefixes, defaultExcludedSubstrings, defaultXrefConfig } from '../src/core/config';
import { createNameFilter } from '../src/core/filter';

test('default filter accepts application code', () => {
  const filter = createNameFilter(defaultXrefConfig());
  assert.equal(filter.isApplicationCode('Game::Player::TakeDamage(int)'), true);
  assert.equal(filter.isApplicationCode('Game::System::Tick(void)'), true);
  assert.deepEqual(filter.explain('Game::Player::TakeDamage(int)'), { accepted: true });
});

test('default filter rejects every configured namespace prefix', () => {
  const filter = createNameFilter(defaultXrefConfig());
  for (const prefix of defaultExcludedPrefixes()) {
    assert.equal(filter.isApplicationCode(`${prefix}Foo(void)`), false, prefix);
  }
});

test('default filter rejects every configured marker anywhere in the name', () => {
  const filter = createNameFilter(defaultXrefConfig());
  for (const marker of defaultExcludedSubstrings()) {
    assert.equal(filter.isApplicationCode(`Game::Player::Run${marker}(void)`), false, marker);
  }
});

test('explain names the rule and entry that rejected a name', () => {
  const filter = createNameFilter(defaultXrefConfig());
  assert.deepEqual(filter.explain('System::String::Concat(System::String)'), {
    accepted: false,
    reason: 'prefix',
    match: 'System::',
  });
  assert.deepEqual(filter.explain('Game::Player::_lambda_1_::operator()(void)'), {
    accepted: false,
    reason: 'substring',
    match: '_lambda_',
  });
});

test('custom lists replace the default policy', () => {
  const filter = createNameFilter({ excludedPrefixes: ['Vendor::'], excludedSubstrings: [] });
  assert.equal(filter.isApplicationCode('System::Foo(void)'), true);
  assert.equal(filter.isApplicationCode('Vendor::Bar(void)'), false);
});

test('filter keeps its own copy of the lists', () => {
  const prefixes = ['Vendor::'];
  const filter = createNameFilter({ excludedPrefixes: prefixes, excludedSubstrings: [] });
  prefixes.push('Game::');
  assert.equal(filter.isApplicationCode('Game::Player::Jump(void)'), true);
});
