import { agentKind } from "@/resources/agent"
import { commandKind } from "@/resources/command"
import { packageKind } from "@/resources/package"
import { skillKind } from "@/resources/skill"
import type { ResourceKind } from "@/resources/types"
import type { ResourceType } from "@/types/branded"

type KindTable = { [K in ResourceType]: ResourceKind<K> }

const RESOURCE_KINDS: KindTable = {
	agent: agentKind,
	command: commandKind,
	package: packageKind,
	skill: skillKind,
}

export function getKind<T extends ResourceType>(type: T): ResourceKind<T> {
	return RESOURCE_KINDS[type]
}
