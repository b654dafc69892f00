/**
 * @fileoverview Descriptor Emitter
 *
 * Produces the frozen snapshot handed to the deployment engine and its
 * canonical JSON form. Canonical output sorts object keys at every level,
 * so two descriptors are equal exactly when their serializations are.
 */

import type { ImmutableDescriptor, ResolvedDescriptor } from "../types/descriptor";
import { isPlainObject, setOwn } from "../utils/objects";
import { toRawBlock } from "./raw-form";

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Copies a resolved descriptor into a deeply frozen snapshot
 *
 * The input is never modified; holders of the result cannot modify it either.
 */
export function emit(descriptor: ResolvedDescriptor): ImmutableDescriptor {
  return deepFreeze(structuredClone(descriptor));
}

/**
 * Document block for one descriptor: extensions flattened to top level, references kept
 */
export function toCanonicalBlock(descriptor: ImmutableDescriptor): Record<string, unknown> {
  return { ...toRawBlock(descriptor), references: descriptor.references };
}

const sortObjectKeys = (_key: string, value: unknown): unknown => {
  if (!isPlainObject(value)) {
    return value;
  }
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    setOwn(sorted, key, value[key]);
  }
  return sorted;
};

/**
 * Canonical JSON text for one descriptor
 */
export function serializeDescriptor(descriptor: ImmutableDescriptor): string {
  return `${JSON.stringify(toCanonicalBlock(descriptor), sortObjectKeys, 2)}\n`;
}

/**
 * Canonical JSON document keyed by environment name, in the given order
 */
export function serializeDocument(descriptors: ReadonlyArray<ImmutableDescriptor>): string {
  const document: Record<string, unknown> = {};
  for (const descriptor of descriptors) {
    setOwn(document, descriptor.name, toCanonicalBlock(descriptor));
  }
  // Environments stay in declaration order; only their blocks are key-sorted
  const keepRootOrder = (key: string, value: unknown): unknown =>
    key === "" ? value : sortObjectKeys(key, value);
  return `${JSON.stringify(document, keepRootOrder, 2)}\n`;
}

/**
 * Field-level equality; key order and formatting are not significant
 */
export function descriptorsEqual(a: ImmutableDescriptor, b: ImmutableDescriptor): boolean {
  return serializeDescriptor(a) === serializeDescriptor(b);
}
