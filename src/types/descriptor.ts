/**
 * A section declaration from the descriptor document.
 *
 * Sections group top-level fields in the UI (`{ key, title, icon, ... }`).
 * The engine never reads them; they are copied onto the root schema as-is.
 */
export type DescriptorSection = Readonly<Record<string, unknown>>;

/** Free-form UI hints copied onto the root schema (`ui_metadata`). */
export type UiMetadata = Readonly<Record<string, unknown>>;

/**
 * Immutable rule set consulted by the synthesizer and the merge engine.
 *
 * All keys are normalized field paths (see `normalizeFieldPath`), so every
 * element of a sequence shares the rules of its un-indexed path.
 *
 * A descriptor is never edited after construction. Reloading produces a new
 * instance which replaces the old one wholesale.
 */
export interface Descriptor {
  /** Paths whose values an update must never overwrite. */
  readonly readonlyPaths: ReadonlySet<string>;

  /**
   * Paths whose sequence-of-scalars value is a fixed option list rather
   * than editable rows.
   */
  readonly enumPaths: ReadonlySet<string>;

  /** Custom labels. Paths without one get a derived title. */
  readonly titles: ReadonlyMap<string, string>;

  /** Help text shown next to a field. */
  readonly descriptions: ReadonlyMap<string, string>;

  /** Ordered grouping declarations, passed through verbatim. */
  readonly sections: readonly DescriptorSection[];

  /** Opaque UI hint bag, passed through verbatim. */
  readonly uiMetadata: UiMetadata;
}
