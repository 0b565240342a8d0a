// Helpers for matching dump keys against names from managed (.NET) metadata.

const GENERIC_METHOD = /^(?<prefix>.+?)<(?<generic>[^<>]+)>(?<params>\(.*\))$/;
const LEADING_GENERIC_TYPE = /^(?<prefix>[^<]+)<[^<>]+>(?=::)/;

function replaceEvery(text: string, search: string, replacement: string): string {
  return text.split(search).join(replacement);
}

/**
 * `NS::Pool::Get<Enemy>(Enemy,int)` -> `NS::Pool::Get(T,int)`;
 * `NS::List<int>::Add(int)` -> `NS::List::Add(int)`.
 */
export function collapseGenerics(name: string): string {
  const match = GENERIC_METHOD.exec(name);
  if (!match?.groups) {
    return name.replace(LEADING_GENERIC_TYPE, '$<prefix>');
  }
  const { prefix, generic, params } = match.groups;
  return `${prefix}${replaceEvery(params, generic, 'T')}`;
}

/** Metadata spelling (`NS.Type/Nested`, arity backticks, `<.ctor>`) to the `::` form used in dumps. */
export function normalizeManagedName(name: string): string {
  if (!name) return name;
  let out = name;
  out = replaceEvery(out, '<.cctor>', '__cctor_');
  out = replaceEvery(out, '<.ctor>', '__ctor_');
  out = replaceEvery(out, 'TEnum', 'T');
  out = out.replace(/`\d*/g, '');
  out = replaceEvery(out, '.', '::');
  out = replaceEvery(out, '/', '::');
  return out;
}

/**
 * Compiler-generated closure and iterator names, e.g.
 * `Game::Player::<Spawn>d__5::MoveNext(void)` -> `Game::Player::_Spawn_d__5::MoveNext(void)`.
 */
export function normalizeXrefName(name: string): string {
  let out = replaceEvery(name, '<>', '__');

  const marker = out.indexOf('>d');
  if (marker !== -1) {
    const head = out.slice(0, marker);
    const tail = out.slice(marker + 2);
    const separator = tail.indexOf('::');
    if (separator !== -1) {
      const stateMachine = tail.slice(0, separator);
      const member = replaceEvery(tail.slice(separator + 2), '::', '_');
      out = `${head}_d${stateMachine}::${member}`;
    }
  }

  out = replaceEvery(out, '>d__', '_d__');
  out = replaceEvery(out, '>b__', '_b__');
  out = replaceEvery(out, '::<', '::_');
  return out;
}
