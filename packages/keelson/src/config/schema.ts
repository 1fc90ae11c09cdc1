/**
 * Schema descriptions for component configuration.
 *
 * A schema maps camelCase field keys to field specs. One generic decoder
 * (see `decode.ts`) interprets any schema, and `Decoded<S>` gives the typed
 * result.
 *
 * @example
 * ```typescript
 * const schema = defineSchema({
 *   workerPool: t.string({ required: true }),
 *   maxWorkers: t.number({ default: 4, integer: true }),
 *   toleration: t.blocks(tolerationSchema),
 *   provider: t.variant({ default: 'packet', cases: { packet: packetSchema } }),
 * });
 * type Config = Decoded<typeof schema>;
 * ```
 */

interface FieldOptions {
  /** Configuration attribute name; defaults to the snake_case form of the field key. */
  attribute?: string;
  required?: boolean;
  description?: string;
}

export interface StringField extends FieldOptions {
  kind: 'string';
  default?: string;
  /** Allowed values; anything else is an error naming the value. */
  oneOf?: readonly string[];
}

export interface NumberField extends FieldOptions {
  kind: 'number';
  default?: number;
  integer?: boolean;
  min?: number;
}

export interface BoolField extends FieldOptions {
  kind: 'bool';
  default?: boolean;
}

export interface StringListField extends FieldOptions {
  kind: 'list';
  default?: readonly string[];
}

export interface StringMapField extends FieldOptions {
  kind: 'map';
  default?: Readonly<Record<string, string>>;
}

/** A single optional nested block. */
export interface BlockField<S extends Schema = Schema> extends FieldOptions {
  kind: 'block';
  schema: S;
}

/** A repeatable nested block, e.g. `toleration`. */
export interface BlockListField<S extends Schema = Schema> extends FieldOptions {
  kind: 'blocks';
  schema: S;
}

/**
 * A tag attribute that selects exactly one sub-block, named after the tag.
 * `provider: packet` makes the `packet` block mandatory and every other case
 * block invalid.
 */
export interface VariantField<C extends Record<string, Schema> = Record<string, Schema>> extends FieldOptions {
  kind: 'variant';
  cases: C;
  default?: keyof C & string;
}

export type FieldSpec =
  | StringField
  | NumberField
  | BoolField
  | StringListField
  | StringMapField
  | BlockField
  | BlockListField
  | VariantField;

export interface Schema {
  readonly [key: string]: FieldSpec;
}

export type VariantValue<C extends Record<string, Schema>> = {
  [K in keyof C & string]: { tag: K; config: Decoded<C[K]> };
}[keyof C & string];

export type FieldValue<F extends FieldSpec> = F extends StringField
  ? string
  : F extends NumberField
    ? number
    : F extends BoolField
      ? boolean
      : F extends StringListField
        ? string[]
        : F extends StringMapField
          ? Record<string, string>
          : F extends BlockListField<infer S extends Schema>
            ? Decoded<S>[]
            : F extends BlockField<infer S extends Schema>
              ? Decoded<S> | undefined
              : F extends VariantField<infer C extends Record<string, Schema>>
                ? VariantValue<C> | undefined
                : never;

export type Decoded<S extends Schema> = { -readonly [K in keyof S]: FieldValue<S[K]> };

export function defineSchema<S extends Schema>(schema: S): S {
  return schema;
}

export const t = {
  string: (options: Omit<StringField, 'kind'> = {}): StringField => ({ kind: 'string', ...options }),
  number: (options: Omit<NumberField, 'kind'> = {}): NumberField => ({ kind: 'number', ...options }),
  bool: (options: Omit<BoolField, 'kind'> = {}): BoolField => ({ kind: 'bool', ...options }),
  list: (options: Omit<StringListField, 'kind'> = {}): StringListField => ({ kind: 'list', ...options }),
  map: (options: Omit<StringMapField, 'kind'> = {}): StringMapField => ({ kind: 'map', ...options }),
  block: <S extends Schema>(schema: S, options: FieldOptions = {}): BlockField<S> => ({
    kind: 'block',
    schema,
    ...options,
  }),
  blocks: <S extends Schema>(schema: S, options: FieldOptions = {}): BlockListField<S> => ({
    kind: 'blocks',
    schema,
    ...options,
  }),
  variant: <C extends Record<string, Schema>>(
    options: Omit<VariantField<C>, 'kind'>,
  ): VariantField<C> => ({ kind: 'variant', ...options }),
};

export function attributeName(key: string, field: FieldSpec): string {
  return field.attribute ?? key.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
}

export function hasRequiredFields(schema: Schema): boolean {
  return Object.values(schema).some((field) => field.required === true);
}
