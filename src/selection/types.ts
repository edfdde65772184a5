/**
 * A caller's parsed selection. Empty sets mean "use the fieldset defaults".
 */
export interface FieldSelection {
  fields: ReadonlySet<string>;
  embed: ReadonlySet<string>;
}

/**
 * Coerces one raw query value; throws on invalid input.
 */
export type SelectionParser = (value: unknown) => Set<string>;
