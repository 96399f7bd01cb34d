/**
 * Branded Types
 *
 * Nominal string types created only by the coercion functions in ./coerce.ts.
 * Once a value carries a brand, downstream code can trust its shape.
 */

// === BRAND SYMBOLS ===

declare const NonEmptyStringBrand: unique symbol
declare const AbsolutePathBrand: unique symbol
declare const SourceIdBrand: unique symbol
declare const SourceNameBrand: unique symbol
declare const ResourceNameBrand: unique symbol

// === BRANDED TYPES ===

/**
 * A non-empty, trimmed string.
 */
export type NonEmptyString = string & { readonly [NonEmptyStringBrand]: true }

/**
 * An absolute, normalized filesystem path.
 */
export type AbsolutePath = string & { readonly [AbsolutePathBrand]: true }

/**
 * Stable source identifier: "src-" followed by 12 hex characters.
 */
export type SourceId = string & { readonly [SourceIdBrand]: true }

/**
 * A source name: lowercase alphanumerics and single hyphens, at most 64 characters.
 */
export type SourceName = string & { readonly [SourceNameBrand]: true }

/**
 * A resource name. Commands and agents may contain "/" separated segments,
 * each following the source-name rules.
 */
export type ResourceName = string & { readonly [ResourceNameBrand]: true }

// === RESOURCE TYPES ===

export const RESOURCE_TYPES = ["command", "skill", "agent", "package"] as const

export type ResourceType = (typeof RESOURCE_TYPES)[number]

const RESOURCE_TYPES_SET: ReadonlySet<string> = new Set(RESOURCE_TYPES)

export function isResourceType(value: string): value is ResourceType {
	return RESOURCE_TYPES_SET.has(value)
}

/**
 * How a resource lands in the repository. Path sources link, remote sources copy.
 */
export type ImportMode = "symlink" | "copy"
