import path from "node:path"
import type { Provenance } from "@/repo/metadata"
import { sourceTypeForUrl } from "@/sources/id"
import type { Source } from "@/sources/manifest"

/**
 * Provenance recorded on every resource imported from a source. The name is
 * always the manifest name, never the basename of the source directory.
 */
export function sourceProvenance(source: Source): Provenance {
	if (source.url !== undefined) {
		return {
			ref: source.ref,
			sourceId: source.id,
			sourceName: source.name,
			sourceType: sourceTypeForUrl(source.url),
			sourceUrl: source.url,
		}
	}

	return {
		sourceId: source.id,
		sourceName: source.name,
		sourceType: "local",
		sourceUrl: `file://${path.resolve(source.path ?? "")}`,
	}
}
