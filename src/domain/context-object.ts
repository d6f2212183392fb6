import type { ZodType, ZodTypeDef } from 'zod';

/**
 * Runtime stand-in for a type parameter.
 *
 * Narrowing needs to know at runtime whether a field has the target type, so
 * typed variants of a context are described by zod schemas. Parsing follows
 * zod's rules: object schemas return the parsed copy (unknown keys stripped
 * unless the schema is `.passthrough()`).
 */
export type TypeSchema<T> = ZodType<T, ZodTypeDef, unknown>;

export interface ContextObjectInit<TValue = unknown, TSubject = unknown> {
  readonly id?: string;
  readonly name?: string;
  readonly subject?: TSubject;
  readonly value?: TValue;
  readonly extras?: Readonly<Record<string, unknown>>;
}

/**
 * Input carrier handed to a condition.
 *
 * - `id`: correlation key, also what subject resolution looks up
 * - `subject`: the entity under evaluation
 * - `value`: comparison operand
 * - `extras`: ad hoc data
 *
 * Instances are frozen; the `with*` methods return copies. A context built for
 * one evaluation can therefore be reused across concurrent evaluations safely.
 */
export class ContextObject<TValue = unknown, TSubject = unknown> {
  readonly id?: string;
  readonly name?: string;
  readonly subject?: TSubject;
  readonly value?: TValue;
  readonly extras?: Readonly<Record<string, unknown>>;

  constructor(init: ContextObjectInit<TValue, TSubject> = {}) {
    this.id = init.id;
    this.name = init.name;
    this.subject = init.subject;
    this.value = init.value;
    this.extras = init.extras;
    Object.freeze(this);
  }

  /** Context carrying only an identifier (or nothing at all). */
  static from(id?: string | null): ContextObject {
    return new ContextObject({ id: id ?? undefined });
  }

  /**
   * Typed view of this context.
   *
   * `value` and `subject` survive only when they parse against the given
   * schema; otherwise they become absent. `id`, `name` and `extras` are carried
   * over unchanged. Pass `z.unknown()` to keep a field as it is.
   */
  narrow<V, S>(valueType: TypeSchema<V>, subjectType: TypeSchema<S>): ContextObject<V, S> {
    return new ContextObject<V, S>({
      id: this.id,
      name: this.name,
      extras: this.extras,
      value: parseOrAbsent(valueType, this.value),
      subject: parseOrAbsent(subjectType, this.subject),
    });
  }

  withValue(value: TValue | undefined): ContextObject<TValue, TSubject> {
    return new ContextObject<TValue, TSubject>({ ...this.toInit(), value });
  }

  withSubject(subject: TSubject | undefined): ContextObject<TValue, TSubject> {
    return new ContextObject<TValue, TSubject>({ ...this.toInit(), subject });
  }

  /** Copy with `data` merged over the existing extras. */
  withExtras(data: Readonly<Record<string, unknown>>): ContextObject<TValue, TSubject> {
    return new ContextObject<TValue, TSubject>({ ...this.toInit(), extras: { ...this.extras, ...data } });
  }

  private toInit(): ContextObjectInit<TValue, TSubject> {
    return { id: this.id, name: this.name, subject: this.subject, value: this.value, extras: this.extras };
  }
}

export function isContextObject(value: unknown): value is ContextObject {
  return value instanceof ContextObject;
}

function parseOrAbsent<T>(schema: TypeSchema<T>, input: unknown): T | undefined {
  if (input === undefined) return undefined;
  const parsed = schema.safeParse(input);
  return parsed.success ? parsed.data : undefined;
}
