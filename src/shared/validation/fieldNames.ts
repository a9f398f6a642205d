/**
 * Field display names
 *
 * A schema field is reported under its `.describe()` text when it has one,
 * otherwise under its own key. Only the leaf name is kept: an issue at
 * `address.zipCode` is reported as `zipCode`, and array indices are skipped.
 */

import { z, type ZodTypeAny } from 'zod';

/**
 * Strip one wrapper (optional, nullable, default, effects, pipeline) if present
 */
function unwrapOnce(schema: ZodTypeAny): ZodTypeAny {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return schema.unwrap();
  }
  if (schema instanceof z.ZodDefault) {
    return schema.removeDefault();
  }
  if (schema instanceof z.ZodEffects) {
    return schema.innerType();
  }
  if (schema instanceof z.ZodPipeline) {
    return schema._def.in;
  }
  return schema;
}

function unwrap(schema: ZodTypeAny): ZodTypeAny {
  let current = schema;
  let inner = unwrapOnce(current);
  while (inner !== current) {
    current = inner;
    inner = unwrapOnce(current);
  }
  return current;
}

/**
 * First description found on the schema or any of its wrappers
 */
function describedAs(schema: ZodTypeAny): string | undefined {
  let current = schema;
  for (;;) {
    if (current.description !== undefined && current.description !== '') {
      return current.description;
    }
    const inner = unwrapOnce(current);
    if (inner === current) {
      return undefined;
    }
    current = inner;
  }
}

function childOf(schema: ZodTypeAny, segment: string | number): ZodTypeAny | undefined {
  const base = unwrap(schema);
  if (base instanceof z.ZodObject && typeof segment === 'string') {
    const shape: Record<string, ZodTypeAny> = base.shape;
    return shape[segment];
  }
  if (base instanceof z.ZodArray && typeof segment === 'number') {
    return base.element;
  }
  if (base instanceof z.ZodRecord && typeof segment === 'string') {
    return base.valueSchema;
  }
  if (base instanceof z.ZodTuple && typeof segment === 'number') {
    const items: ZodTypeAny[] = base.items;
    return items[segment];
  }
  return undefined;
}

/**
 * Display name of the value at `path` inside `root`
 * @param rootField - name used when the path holds no field key
 */
export function fieldDisplayName(
  root: ZodTypeAny,
  path: ReadonlyArray<string | number>,
  rootField: string
): string {
  let current: ZodTypeAny | undefined = root;
  let name: string | undefined;

  for (const segment of path) {
    current = current === undefined ? undefined : childOf(current, segment);
    if (typeof segment === 'string') {
      name = (current === undefined ? undefined : describedAs(current)) ?? segment;
    }
  }

  return name ?? rootField;
}
