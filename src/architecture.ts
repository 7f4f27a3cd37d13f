/**
 * ARCHITECTURE INDEX
 *
 * DEFINITION
 * 1. Normalized Path Key Space
 *
 * POLICY
 * 2. Protected Field Policy
 * 3. Atomic Descriptor Swap
 *
 * STRATEGY
 * 4. Representative Item Schema
 *
 * Recommended reading flow:
 * DEFINITION -> POLICY -> STRATEGY
 */

/**
 * ARCHITECTURAL DEFINITION (1)
 * Normalized Path Key Space
 *
 * ---
 *
 * Two path forms exist:
 *
 * - Accumulated paths are built while walking a tree and keep every ordinal
 *   (`servers[0].port`). They are what skip notices and logs report, so an
 *   operator can find the exact element.
 * - Normalized paths drop every ordinal (`servers.port`). They are the only
 *   keys of the descriptor's rule sets.
 *
 * Every descriptor lookup normalizes the path it is given. Descriptor keys
 * are normalized once, when the descriptor is built. Consequently all
 * elements of a sequence share one set of rules, and a rule authored with an
 * ordinal (`servers[0].port`) applies to every element.
 */
export type NormalizedPathKeySpace = never;

/**
 * ARCHITECTURAL POLICY (2)
 * Protected Field Policy
 *
 * ---
 *
 * A selective merge writes only what the caller explicitly supplied, minus
 * what the descriptor protects.
 *
 * 1. Read-only paths
 *    The entry is skipped before any structural inspection. Nested content of
 *    a read-only mapping is never visited.
 *
 * 2. Enumeration paths
 *    An enumeration's option list lives in the values tree, but it is metadata
 *    rather than editable rows. A form submits the *selected* options at that
 *    key, which must not replace the option list. The entry is skipped when
 *    the current value is a sequence; when it is anything else there is no
 *    option list to protect and the entry is written normally.
 *
 * 3. Ancestors
 *    Protection extends upwards. An entry whose wholesale replacement would
 *    discard a read-only entry or an enum option list below it is skipped
 *    with that entry's reason. A new mapping written where the current tree
 *    holds no mapping is merged into an empty one, so the read-only paths it
 *    carries are skipped rather than created.
 *
 * 4. Reporting
 *    A skip is not an error. It is returned as a `SkipNotice` and logged at
 *    `info` level; the merge still succeeds.
 *
 * 5. Preservation
 *    Keys absent from the update are never touched, at any depth. The merge
 *    never deletes.
 */
export type ProtectedFieldPolicy = never;

/**
 * ARCHITECTURAL POLICY (3)
 * Atomic Descriptor Swap
 *
 * ---
 *
 * 1. Snapshots are immutable
 *    A descriptor is frozen when built and never edited afterwards.
 *
 * 2. Reload replaces, never patches
 *    `reload()` builds a complete new descriptor off to the side and installs
 *    it with a single assignment. No reader can observe a mix of old and new
 *    rules.
 *
 * 3. In-flight readers keep their snapshot
 *    An operation captures `snapshot()` once and passes it down. A reload that
 *    completes mid-operation affects only operations started afterwards.
 *
 * 4. Last issued reload wins
 *    Loads may settle out of order. A load that settles after a newer reload
 *    was issued is discarded.
 */
export type AtomicDescriptorSwap = never;

/**
 * ARCHITECTURAL STRATEGY (4)
 * Representative Item Schema
 *
 * ---
 *
 * A sequence of mappings is described by one item schema synthesized from its
 * first element, addressed at `<path>[0]`. Later elements are not inspected;
 * keys they have that the first element lacks do not appear in the schema.
 *
 * Item title:
 * - a custom title for `<path>[0]` (which normalizes to `<path>`) is used
 *   as-is;
 * - otherwise the array title loses one trailing `s`, or gains ` Item` when
 *   it has none (see `deriveItemTitle`).
 *
 * A sequence marked as enumeration whose first element is a mapping is not an
 * option list; it follows this strategy like any other sequence of mappings.
 */
export type RepresentativeItemSchema = never;
