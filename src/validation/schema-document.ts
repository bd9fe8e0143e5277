/**
 * Structural checks on a JSON Schema document that the schema compiler does
 * not make: local `$ref` resolution and reference cycles that would recurse
 * on the same instance forever.
 */

type SchemaObject = Record<string, unknown>;

const isSchemaObject = (value: unknown): value is SchemaObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Keywords whose subschemas apply to the instance itself.
const SAME_INSTANCE_LISTS = ['allOf', 'anyOf', 'oneOf'] as const;
const SAME_INSTANCE_SINGLE = ['not', 'if', 'then', 'else'] as const;
// Keywords whose subschemas apply to a part of the instance.
const DESCENDING_SINGLE = ['additionalProperties', 'additionalItems', 'contains', 'propertyNames'] as const;
const SCHEMA_MAPS = ['properties', 'patternProperties', 'definitions', '$defs'] as const;

const decodePointerToken = (token: string): string =>
  token
    .replace(/%([0-9a-fA-F]{2})/g, (_match, hex: string) => String.fromCharCode(parseInt(hex, 16)))
    .replace(/~1/g, '/')
    .replace(/~0/g, '~');

/**
 * Resolve a same-document `$ref` (`#` or a `#/...` JSON pointer). Returns
 * `undefined` for anything else.
 */
const resolveLocalRef = (root: unknown, ref: string): unknown => {
  if (ref === '#') {
    return root;
  }
  if (!ref.startsWith('#/')) {
    return undefined;
  }
  let current: unknown = root;
  for (const token of ref.slice(2).split('/').map(decodePointerToken)) {
    if (Array.isArray(current)) {
      const index = Number(token);
      current = Number.isInteger(index) ? current[index] : undefined;
    } else if (isSchemaObject(current) && Object.prototype.hasOwnProperty.call(current, token)) {
      current = current[token];
    } else {
      return undefined;
    }
  }
  return current;
};

const dependencySchemas = (node: SchemaObject): unknown[] =>
  isSchemaObject(node.dependencies)
    ? Object.values(node.dependencies).filter((value) => !Array.isArray(value))
    : [];

const sameInstanceChildren = (root: unknown, node: SchemaObject): unknown[] => {
  const children: unknown[] = [];
  if (typeof node.$ref === 'string') {
    const target = resolveLocalRef(root, node.$ref);
    if (target !== undefined) {
      children.push(target);
    }
  }
  for (const key of SAME_INSTANCE_LISTS) {
    const list = node[key];
    if (Array.isArray(list)) {
      children.push(...list);
    }
  }
  for (const key of SAME_INSTANCE_SINGLE) {
    if (node[key] !== undefined) {
      children.push(node[key]);
    }
  }
  children.push(...dependencySchemas(node));
  return children;
};

const nestedSchemas = (node: SchemaObject): unknown[] => {
  const nested: unknown[] = [];
  for (const key of SAME_INSTANCE_LISTS) {
    const list = node[key];
    if (Array.isArray(list)) {
      nested.push(...list);
    }
  }
  for (const key of [...SAME_INSTANCE_SINGLE, ...DESCENDING_SINGLE]) {
    if (node[key] !== undefined) {
      nested.push(node[key]);
    }
  }
  for (const key of SCHEMA_MAPS) {
    const map = node[key];
    if (isSchemaObject(map)) {
      nested.push(...Object.values(map));
    }
  }
  if (Array.isArray(node.items)) {
    nested.push(...node.items);
  } else if (node.items !== undefined) {
    nested.push(node.items);
  }
  nested.push(...dependencySchemas(node));
  return nested;
};

const collectSchemaObjects = (root: unknown): SchemaObject[] => {
  const seen = new Set<SchemaObject>();
  const visit = (node: unknown): void => {
    if (!isSchemaObject(node) || seen.has(node)) {
      return;
    }
    seen.add(node);
    nestedSchemas(node).forEach(visit);
  };
  visit(root);
  return [...seen];
};

/**
 * True when some schema reaches itself through `$ref` and combinators
 * without descending into a property or item, e.g. `{ "$ref": "#" }`.
 */
export const hasSameInstanceRefCycle = (root: unknown): boolean => {
  const state = new Map<SchemaObject, 'active' | 'done'>();
  const visit = (node: SchemaObject): boolean => {
    const current = state.get(node);
    if (current === 'active') {
      return true;
    }
    if (current === 'done') {
      return false;
    }
    state.set(node, 'active');
    for (const child of sameInstanceChildren(root, node)) {
      if (isSchemaObject(child) && visit(child)) {
        return true;
      }
    }
    state.set(node, 'done');
    return false;
  };
  return collectSchemaObjects(root).some(visit);
};
