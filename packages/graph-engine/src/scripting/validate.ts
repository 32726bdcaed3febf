import * as acorn from 'acorn';

/** Names a script may not mention, as identifiers or as string keys. */
const BLOCKED_IDENTIFIERS = new Set([
  'require',
  'module',
  'exports',
  'process',
  'global',
  'globalThis',
  'eval',
  'Function',
  'AsyncFunction',
  'GeneratorFunction',
  'constructor',
  '__proto__',
  '__defineGetter__',
  '__defineSetter__',
  '__lookupGetter__',
  'import',
  'Reflect',
  'Proxy',
  'WebAssembly',
  'SharedArrayBuffer',
  'Atomics',
  'Buffer',
  'fetch',
  'setTimeout',
  'setInterval',
  'setImmediate',
  'queueMicrotask',
  '__meshgraph',
]);

/** Maximum nesting depth for AST nodes. */
const MAX_AST_DEPTH = 64;

export type ValidationResult =
  | { valid: true }
  | { valid: false; kind: 'syntax' | 'blocked'; error: string };

function isAstNode(value: unknown): value is acorn.Node {
  return typeof value === 'object' && value !== null && 'type' in value && typeof value.type === 'string';
}

function walkAst(node: acorn.Node, visit: (node: acorn.Node, depth: number) => void, depth = 0): void {
  visit(node, depth);
  for (const [key, val] of Object.entries(node)) {
    if (key === 'type' || key === 'start' || key === 'end' || key === 'loc') continue;
    const child: unknown = val;
    if (Array.isArray(child)) {
      for (const item of child) if (isAstNode(item)) walkAst(item, visit, depth + 1);
    } else if (isAstNode(child)) {
      walkAst(child, visit, depth + 1);
    }
  }
}

/**
 * Static check of a script source before it is run.
 *
 * Parses with acorn as a classic script and rejects blocked globals, string
 * keys spelling a blocked name (`x["constructor"]`), dynamic `import()`,
 * `with` statements, and nesting deeper than MAX_AST_DEPTH.
 */
export function validateScript(source: string): ValidationResult {
  let ast: acorn.Node;
  try {
    ast = acorn.parse(source, { ecmaVersion: 2022, sourceType: 'script' });
  } catch (err) {
    return { valid: false, kind: 'syntax', error: `Syntax error: ${err instanceof Error ? err.message : 'parse failed'}` };
  }

  let violation: string | null = null;
  walkAst(ast, (node, depth) => {
    if (violation) return;
    if (depth > MAX_AST_DEPTH) {
      violation = `Script exceeds maximum nesting depth of ${MAX_AST_DEPTH}`;
      return;
    }
    if (node.type === 'Identifier' && 'name' in node && typeof node.name === 'string' && BLOCKED_IDENTIFIERS.has(node.name)) {
      violation = `Blocked identifier "${node.name}" is not allowed in scripts`;
    } else if (node.type === 'Literal' && 'value' in node && typeof node.value === 'string' && BLOCKED_IDENTIFIERS.has(node.value)) {
      violation = `Blocked string "${node.value}" is not allowed in scripts`;
    } else if (node.type === 'ImportExpression') {
      violation = 'Dynamic import() is not allowed in scripts';
    } else if (node.type === 'WithStatement') {
      violation = '"with" statements are not allowed in scripts';
    }
  });

  return violation ? { valid: false, kind: 'blocked', error: violation } : { valid: true };
}
