import * as Option from "effect/Option"

// CHANGE: add per-enum name lookup tables for encoding enum members by name
// WHY: TS enum members are bare numbers/strings at runtime; the member name must come from a table
// QUOTE(TZ): n/a
// REF: req-enum-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e,m ∈ e: nameOf(e, value(m)) = Some(name(m))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: table is built once per enum and never mutated
// COMPLEXITY: O(n) build / O(1) lookup

export const EnumMemberTypeId: unique symbol = Symbol.for("typed-jsonify/EnumMember")
export type EnumMemberTypeId = typeof EnumMemberTypeId

export type EnumDefinition = { readonly [name: string]: string | number }

// numeric enums carry a reverse number index; only the named members count
export type EnumValue<E extends EnumDefinition> = E[Exclude<keyof E, number>] & (string | number)

/** The lookup half of an enumeration, shared by all of its members. */
export interface EnumTable {
  readonly name: string
  readonly nameOf: (value: string | number) => Option.Option<string>
}

export interface EnumMember {
  readonly [EnumMemberTypeId]: EnumMemberTypeId
  readonly enumeration: EnumTable
  readonly value: string | number
}

export interface Enumeration<E extends EnumDefinition> extends EnumTable {
  readonly names: ReadonlyArray<string>
  member(value: EnumValue<E>): EnumMember
}

const isReverseMapping = (definition: EnumDefinition, key: string): boolean => {
  const value = definition[key]
  if (typeof value !== "string") {
    return false
  }
  const forward = definition[value]
  return typeof forward === "number" && String(forward) === key
}

/**
 * Build the lookup table for a TS enum (or an `as const` object of members).
 *
 * @param name - Enum name used in error messages.
 * @param definition - The enum object itself.
 * @returns Enumeration whose members encode as their symbolic names.
 *
 * @pure true
 * @invariant aliases (two names, one value) resolve to the first declared name
 * @complexity O(n)
 */
export const makeEnumeration = <E extends EnumDefinition>(
  name: string,
  definition: E
): Enumeration<E> => {
  const names = Object.keys(definition).filter((key) => !isReverseMapping(definition, key))
  const byValue = new Map<string | number, string>()
  for (const memberName of names) {
    const value = definition[memberName]
    if (value !== undefined && !byValue.has(value)) {
      byValue.set(value, memberName)
    }
  }
  const table: EnumTable = {
    name,
    nameOf: (value) => Option.fromNullable(byValue.get(value))
  }
  return {
    ...table,
    names,
    member: (value) => ({ [EnumMemberTypeId]: EnumMemberTypeId, enumeration: table, value })
  }
}

export const isEnumMember = (value: unknown): value is EnumMember =>
  typeof value === "object" && value !== null && EnumMemberTypeId in value
