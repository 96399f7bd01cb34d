import fs from "node:fs"
import path from "node:path"
import dotenv from "dotenv"
import { z } from "zod"

const envPath = path.resolve(process.cwd(), ".env")
const dotenvResult = fs.existsSync(envPath) ? dotenv.config({ path: envPath }) : { parsed: {} }

const str = () => z.string().trim().min(1)

export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug", "trace"] as const

export type LogLevelName = (typeof LOG_LEVELS)[number]

export const schema = z.object({
	AIREPO_CONFIG: str().optional(),
	AIREPO_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
	AIREPO_PATH: str().optional(),
	HOME: str().optional(),
	XDG_CONFIG_HOME: str().optional(),
	XDG_DATA_HOME: str().optional(),
})

export type Env = z.infer<typeof schema>

export function parseEnv(source: Record<string, string | undefined>): Env {
	return schema.parse(source)
}

const mergedEnv = {
	...(dotenvResult.parsed ?? {}),
	...process.env,
}

export const env = parseEnv(mergedEnv)
