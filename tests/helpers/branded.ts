/**
 * Test-only branded type helpers
 *
 * These cast strings directly to branded types without validation.
 * Only use in tests where you control the input values.
 */

import type { AbsolutePath, ResourceName } from "@/types/branded"

/** Cast string to AbsolutePath (test-only, no validation) */
export const abs = (s: string): AbsolutePath => s as AbsolutePath

/** Cast string to ResourceName (test-only, no validation) */
export const rname = (s: string): ResourceName => s as ResourceName
