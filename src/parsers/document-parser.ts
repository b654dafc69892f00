/**
 * @fileoverview Environment Document Parser
 *
 * Reads the JSON text of an environments document into raw per-environment
 * blocks. Two root shapes are accepted:
 *
 * ```json
 * { "dev": { "region": "us-east-1" }, "production": { ... } }
 * [ { "name": "dev", "region": "us-east-1" }, { "name": "production", ... } ]
 * ```
 *
 * Blocks are returned in declaration order and are not validated here.
 * JSON.parse keeps the last of two equal keys, so the text is also read as
 * a YAML document (JSON is a subset) to find keys that were written twice.
 */

import { isMap, isScalar, isSeq, parseDocument } from "yaml";
import type { RawEnvironmentEntry, RepeatedKey } from "../types/descriptor";
import { DocumentParseError, DuplicateNameError, ValidationError } from "../types/errors";
import { formatFieldPath, isPlainObject } from "../utils/objects";

function parseJson(text: string, origin: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DocumentParseError(`invalid JSON: ${reason}`, origin);
  }
}

const keyText = (key: unknown): string => String(isScalar(key) ? key.value : key);

function collectRepeatedKeys(
  node: unknown,
  path: Array<string | number>,
  found: RepeatedKey[],
): RepeatedKey[] {
  if (isMap(node)) {
    const seen = new Set<string>();
    for (const pair of node.items) {
      const key = keyText(pair.key);
      if (seen.has(key)) {
        found.push({ fieldPath: formatFieldPath(path) || "(root)", key });
      }
      seen.add(key);
      collectRepeatedKeys(pair.value, [...path, key], found);
    }
  } else if (isSeq(node)) {
    node.items.forEach((item, index) => collectRepeatedKeys(item, [...path, index], found));
  }
  return found;
}

/**
 * Syntax tree of text already known to be valid JSON
 */
function parseTree(text: string): unknown {
  return parseDocument(text, { uniqueKeys: false }).contents;
}

function entriesFromObject(
  document: Record<string, unknown>,
  tree: unknown,
  origin: string,
): RawEnvironmentEntry[] {
  const repeatedByName = new Map<string, RepeatedKey[]>();
  if (isMap(tree)) {
    for (const pair of tree.items) {
      const name = keyText(pair.key);
      if (repeatedByName.has(name)) {
        throw new DuplicateNameError(name, { origin });
      }
      repeatedByName.set(name, collectRepeatedKeys(pair.value, [], []));
    }
  }

  return Object.entries(document).map(([name, raw]) => {
    if (name.length === 0) {
      throw new DocumentParseError("environment names must not be empty", origin);
    }
    if (!isPlainObject(raw)) {
      throw new DocumentParseError(`environment "${name}" must be an object`, origin, name);
    }
    return { name, raw, origin, repeatedKeys: repeatedByName.get(name) ?? [] };
  });
}

function entriesFromArray(
  document: unknown[],
  tree: unknown,
  origin: string,
): RawEnvironmentEntry[] {
  const items = isSeq(tree) ? tree.items : [];
  return document.map((raw, index) => {
    if (!isPlainObject(raw)) {
      throw new DocumentParseError(`entry [${index}] must be an object`, origin);
    }
    const { name } = raw;
    if (typeof name !== "string" || name.length === 0) {
      throw new DocumentParseError(
        `entry [${index}] must have a non-empty string "name"`,
        origin,
      );
    }
    return { name, raw, origin, repeatedKeys: collectRepeatedKeys(items[index], [], []) };
  });
}

/**
 * Parses an environments document
 *
 * @param text - JSON text
 * @param origin - Where the text came from, used in errors and on each entry
 * @throws {DocumentParseError} On invalid JSON or an unexpected shape
 * @throws {DuplicateNameError} When an object root names an environment twice
 */
export function parseEnvironmentDocument(text: string, origin: string): RawEnvironmentEntry[] {
  const document = parseJson(text, origin);

  if (Array.isArray(document)) {
    return entriesFromArray(document, parseTree(text), origin);
  }
  if (isPlainObject(document)) {
    return entriesFromObject(document, parseTree(text), origin);
  }

  throw new DocumentParseError(
    "document root must be an object keyed by environment name or an array of environment blocks",
    origin,
  );
}

/**
 * Parses a defaults document: a single environment block without a name
 *
 * @throws {DocumentParseError} On invalid JSON or a non-object root
 * @throws {ValidationError} When a key is written twice in the same object
 */
export function parseDefaultsDocument(text: string, origin: string): Record<string, unknown> {
  const document = parseJson(text, origin);
  if (!isPlainObject(document)) {
    throw new DocumentParseError("defaults document must be an object", origin);
  }

  const [repeated] = collectRepeatedKeys(parseTree(text), [], []);
  if (repeated) {
    throw new ValidationError(
      `duplicate key "${repeated.key}"`,
      "defaults",
      repeated.fieldPath,
      "unique",
      { origin },
    );
  }
  return document;
}
