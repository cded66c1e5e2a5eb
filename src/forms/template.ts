import { z } from 'zod';
import { DecodingError } from '../errors.js';

export const FORM_URLENCODED = 'application/x-www-form-urlencoded';

export interface FieldSpec {
  /** Type tag declared by the service, e.g. `String` or `Integer`. */
  readonly type: string;
  readonly default?: string;
  readonly repeatable: boolean;
}

export interface FormTemplate {
  readonly name: string;
  readonly method: string;
  readonly rel?: string;
  readonly enctype: string;
  readonly action: string;
  readonly fields: ReadonlyMap<string, FieldSpec>;
  readonly defaultData: ReadonlyMap<string, string>;
}

export interface FormTemplateInit {
  name: string;
  method?: string;
  rel?: string;
  enctype?: string;
  action: string;
  fields: Record<string, { type?: string; default?: string; repeatable?: boolean }>;
}

/**
 * Builds an immutable template. Fields keep their declaration order and every
 * field with a default contributes to `defaultData`.
 */
export function defineForm(init: FormTemplateInit): FormTemplate {
  const fields = new Map<string, FieldSpec>();
  const defaultData = new Map<string, string>();
  for (const [fieldName, spec] of Object.entries(init.fields)) {
    const field: FieldSpec = {
      type: spec.type ?? 'String',
      repeatable: spec.repeatable ?? false,
      ...(spec.default !== undefined ? { default: spec.default } : {}),
    };
    fields.set(fieldName, Object.freeze(field));
    if (field.default !== undefined) {
      defaultData.set(fieldName, field.default);
    }
  }
  return Object.freeze({
    name: init.name,
    method: init.method ?? 'GET',
    ...(init.rel !== undefined ? { rel: init.rel } : {}),
    enctype: init.enctype ?? FORM_URLENCODED,
    action: init.action,
    fields,
    defaultData,
  });
}

const fieldJsonSchema = z.object({
  type: z.string(),
  multiple: z.boolean().optional(),
  default: z.union([z.string(), z.number()]).optional(),
});

const formJsonSchema = z.object({
  name: z.string().optional(),
  method: z.string(),
  rel: z.string().optional(),
  enctype: z.string(),
  action: z.string(),
  fields: z.record(fieldJsonSchema),
});

/**
 * Parses one entry of the repository's `forms` object, as published by the
 * service, into a {@link FormTemplate}.
 */
export function parseFormTemplate(name: string, json: unknown): FormTemplate {
  const parsed = formJsonSchema.safeParse(json);
  if (!parsed.success) {
    throw new DecodingError(`Invalid form template "${name}": ${parsed.error.message}`, parsed.error);
  }
  const form = parsed.data;
  const fields: FormTemplateInit['fields'] = {};
  for (const [fieldName, field] of Object.entries(form.fields)) {
    fields[fieldName] = {
      type: field.type,
      repeatable: field.multiple ?? false,
      ...(field.default !== undefined ? { default: String(field.default) } : {}),
    };
  }
  return defineForm({
    name,
    method: form.method,
    ...(form.rel !== undefined ? { rel: form.rel } : {}),
    enctype: form.enctype,
    action: form.action,
    fields,
  });
}

const ACCESSOR_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;

/** `pageSize` -> `page_size`, `fetchLinks` -> `fetch_links`. */
export function accessorName(fieldName: string): string {
  return fieldName.replace(/([A-Z])/g, '_$1').toLowerCase();
}

const accessorTables = new WeakMap<FormTemplate, ReadonlyMap<string, string>>();

/**
 * Maps accessor name -> field name for every field that gets a helper.
 * Built once per template. `ref` is excluded, as are names that would shadow
 * one of `reserved`.
 */
export function fieldAccessors(template: FormTemplate, reserved: ReadonlySet<string>): ReadonlyMap<string, string> {
  const cached = accessorTables.get(template);
  if (cached !== undefined) return cached;

  const table = new Map<string, string>();
  for (const fieldName of template.fields.keys()) {
    if (fieldName === 'ref' || !ACCESSOR_PATTERN.test(fieldName)) continue;
    const accessor = accessorName(fieldName);
    if (reserved.has(accessor) || table.has(accessor)) continue;
    table.set(accessor, fieldName);
  }
  accessorTables.set(template, table);
  return table;
}
