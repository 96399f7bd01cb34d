/**
 * Resource fixtures
 *
 * Writers for the four resource shapes, so tests can lay out a source tree
 * in a few lines.
 */

import { mkdir, writeFile } from "node:fs/promises"
import { dirname, join } from "node:path"

export async function writeFileDeep(filePath: string, contents: string): Promise<string> {
	await mkdir(dirname(filePath), { recursive: true })
	await writeFile(filePath, contents)
	return filePath
}

export function markdown(fields: Record<string, string>, body = "Body text."): string {
	const lines = Object.entries(fields).map(([key, value]) => `${key}: ${value}`)
	return `---\n${lines.join("\n")}\n---\n\n${body}\n`
}

/**
 * `<root>/commands/<name>.md`; nested names create subdirectories.
 */
export async function writeCommand(
	root: string,
	name: string,
	description = `Run ${name}`,
): Promise<string> {
	return writeFileDeep(join(root, "commands", `${name}.md`), markdown({ description }))
}

export async function writeAgent(
	root: string,
	name: string,
	description = `Agent ${name}`,
): Promise<string> {
	return writeFileDeep(join(root, "agents", `${name}.md`), markdown({ description }))
}

/**
 * `<root>/skills/<name>/SKILL.md`
 */
export async function writeSkill(
	root: string,
	name: string,
	description = `Skill ${name}`,
): Promise<string> {
	const dir = join(root, "skills", name)
	await writeFileDeep(join(dir, "SKILL.md"), markdown({ description, name }))
	return dir
}

export async function writePackage(
	root: string,
	name: string,
	resources: string[],
	description = `Package ${name}`,
): Promise<string> {
	const body = JSON.stringify({ description, name, resources }, null, 2)
	return writeFileDeep(join(root, "packages", `${name}.package.json`), `${body}\n`)
}
