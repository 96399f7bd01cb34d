import { dedupeByName, type Discovery, type DiscoveryIssue } from "@/discovery/types"
import { findDirs, isSkippedDir, type WalkOptions } from "@/discovery/walk"
import type { IoResult } from "@/io/fs"
import { isSkillDir, loadSkill } from "@/resources/skill"
import type { SkillResource } from "@/resources/types"
import type { AbsolutePath } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"

/**
 * Where agent tools conventionally keep skills, in search order.
 */
export const SKILL_LOCATIONS = [
	"skills",
	".claude/skills",
	".opencode/skills",
	".github/skills",
	".codex/skills",
	".cursor/skills",
	".agents/skills",
]

export async function discoverSkills(root: AbsolutePath): Promise<IoResult<Discovery<"skill">>> {
	const issues: DiscoveryIssue[] = []

	if (await isSkillDir(root)) {
		const skill = await loadSkill(root)
		if (skill.ok) {
			return { ok: true, value: { issues, resources: [skill.value] } }
		}
		issues.push({ message: skill.error.message, path: root })
	}

	const resources: SkillResource[] = []
	for (const location of SKILL_LOCATIONS) {
		const dir = joinAbsolute(root, ...location.split("/"))
		const found = await loadSkillDirs(dir, { maxDepth: 1 }, issues)
		if (!found.ok) {
			return found
		}
		resources.push(...found.value)
	}

	if (resources.length === 0) {
		const found = await loadSkillDirs(root, { skipDir: isSkippedDir }, issues)
		if (!found.ok) {
			return found
		}
		resources.push(...found.value)
	}

	return { ok: true, value: { issues, resources: dedupeByName(resources) } }
}

async function loadSkillDirs(
	dir: AbsolutePath,
	options: WalkOptions,
	issues: DiscoveryIssue[],
): Promise<IoResult<SkillResource[]>> {
	const dirs = await findDirs(dir, isSkillDir, options)
	if (!dirs.ok) {
		return dirs
	}

	const skills: SkillResource[] = []
	for (const skillDir of dirs.value) {
		const skill = await loadSkill(skillDir)
		if (skill.ok) {
			skills.push(skill.value)
		} else {
			issues.push({ message: skill.error.message, path: skillDir })
		}
	}
	return { ok: true, value: skills }
}
