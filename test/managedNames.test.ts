import test from 'node:test';
import assert from 'node:assert/strict';
import { collapseGenerics, normalizeManagedName, normalizeXrefName } from '../src/core/managedNames';

test('collapseGenerics folds generic method arguments into T', () => {
  assert.equal(collapseGenerics('Game::Pool::Get<Game::Enemy>(Game::Enemy,int)'), 'Game::Pool::Get(T,int)');
  assert.equal(collapseGenerics('Game::Pool::Get<Game::Enemy>(void)'), 'Game::Pool::Get(void)');
});

test('collapseGenerics drops the arguments of a leading generic type', () => {
  assert.equal(collapseGenerics('Game::List<int>::Add(int)'), 'Game::List::Add(int)');
  assert.equal(collapseGenerics('Game::Player::Jump(void)'), 'Game::Player::Jump(void)');
});

test('normalizeManagedName converts metadata spelling to dump spelling', () => {
  assert.equal(normalizeManagedName('Game.Player/Inventory.Add'), 'Game::Player::Inventory::Add');
  assert.equal(normalizeManagedName('System.Collections.Generic.List`1'), 'System::Collections::Generic::List');
  assert.equal(normalizeManagedName('Game.Save.<.cctor>b__0'), 'Game::Save::__cctor_b__0');
  assert.equal(normalizeManagedName('Game.Flags.Has<TEnum>'), 'Game::Flags::Has<T>');
  assert.equal(normalizeManagedName(''), '');
});

test('normalizeXrefName rewrites iterator and closure names', () => {
  assert.equal(
    normalizeXrefName('Game::Player::<Spawn>d__5::MoveNext(void)'),
    'Game::Player::_Spawn_d__5::MoveNext(void)'
  );
  assert.equal(
    normalizeXrefName('Game::Player::<Spawn>d__5::System::IDisposable::Dispose(void)'),
    'Game::Player::_Spawn_d__5::System_IDisposable_Dispose(void)'
  );
  assert.equal(
    normalizeXrefName('Game::Player::<>c::<Start>b__3_0(void)'),
    'Game::Player::__c::_Start_b__3_0(void)'
  );
  assert.equal(normalizeXrefName('Game::<Run>d'), 'Game::_Run>d');
  assert.equal(normalizeXrefName('Game::Player::Jump(void)'), 'Game::Player::Jump(void)');
});
