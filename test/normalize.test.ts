import test from 'node:test';
import assert from 'node:assert/strict';
import {
  disambiguateArrayReferences,
  normalizeName,
  stripReturnType,
} from '../src/core/normalize';

test('normalizeName strips the return type before the namespace path', () => {
  assert.equal(normalizeName('ReturnType NS::Class::Method(int)'), 'NS::Class::Method(int)');
  assert.equal(normalizeName('void Game::Player::TakeDamage(int, float)'), 'Game::Player::TakeDamage(int,float)');
  assert.equal(normalizeName('public: static bool Game::Save::Write(int)'), 'Game::Save::Write(int)');
  assert.equal(normalizeName('void\tGame::Tick(void)'), 'Game::Tick(void)');
});

test('normalizeName only looks at whitespace before the first separator', () => {
  assert.equal(
    normalizeName('class std::basic_string<char, std::char_traits<char> > Util::Join(int)'),
    'std::basic_string<char,std::char_traits<char>>Util::Join(int)'
  );
  assert.equal(normalizeName('NS::Foo::Bar( int )'), 'NS::Foo::Bar(int)');
});

test('normalizeName removes whitespace from names without a namespace', () => {
  assert.equal(normalizeName('int main(int argc, char** argv)'), 'intmain(intargc,char**argv)');
  assert.equal(normalizeName('void Game::Unit::Move(int, float)'), 'Game::Unit::Move(int,float)');
});

test('normalizeName marks array references for TryGet...Array methods', () => {
  assert.equal(normalizeName('bool NS::TryGetValueArray(int&)'), 'NS::TryGetValueArray(int[]&)');
  assert.equal(
    normalizeName('bool Game::Inventory::TryGetItemsArray(Item &, int &)'),
    'Game::Inventory::TryGetItemsArray(Item[]&,int[]&)'
  );
  assert.equal(normalizeName('bool NS::TryGetValueArray(int[]&)'), 'NS::TryGetValueArray(int[]&)');
});

test('normalizeName leaves references alone for other methods', () => {
  assert.equal(normalizeName('void Game::Swap(int&, int&)'), 'Game::Swap(int&,int&)');
  assert.equal(normalizeName('bool Game::tryGetArray(int&)'), 'Game::tryGetArray(int&)');
  assert.equal(normalizeName('bool Game::ArrayTryGet(int&)'), 'Game::ArrayTryGet(int&)');
});

test('normalizeName tolerates empty and short input', () => {
  assert.equal(normalizeName(''), '');
  assert.equal(normalizeName('   '), '');
  assert.equal(normalizeName('::'), '::');
  assert.equal(normalizeName('a'), 'a');
});

test('normalizeName is idempotent and leaves no whitespace', () => {
  const samples = [
    'ReturnType NS::Class::Method(int)',
    'bool NS::TryGetValueArray(int&)',
    'bool NS::TryGetArray(int[] &)',
    'Try Get Array(int &)',
    'bool Game::TryGet\nItemsArray(Item&)',
    'class std::vector<int, std::allocator<int> > Game::Grid::Cells(void)',
    'void Game::Ünit::Move(int, float)',
    '  leading::and trailing  ',
    '',
  ];
  for (const sample of samples) {
    const once = normalizeName(sample);
    assert.equal(normalizeName(once), once, sample);
    assert.equal(/\s/.test(once), false, sample);
  }
});

test('stripReturnType keeps names whose prefix has no whitespace', () => {
  assert.equal(stripReturnType('Game::Player::Jump(void)'), 'Game::Player::Jump(void)');
  assert.equal(stripReturnType('void Jump(void)'), 'void Jump(void)');
});

test('disambiguateArrayReferences matches across whitespace in the method name', () => {
  assert.equal(disambiguateArrayReferences('Try Get Array(int&)'), 'Try Get Array(int[]&)');
  assert.equal(disambiguateArrayReferences('Get Array(int&)'), 'Get Array(int&)');
});
