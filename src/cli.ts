#!/usr/bin/env node

import { Command } from "commander"
import { consola, LogLevels } from "consola"
import { clean } from "@/commands/clean"
import { install } from "@/commands/install"
import { listInstalledCommand } from "@/commands/list-installed"
import { repoAdd } from "@/commands/repo/add"
import { repoInit } from "@/commands/repo/init"
import { repoList } from "@/commands/repo/list"
import { repoPrune } from "@/commands/repo/prune"
import { repoRemove } from "@/commands/repo/remove"
import { repoRepair } from "@/commands/repo/repair"
import { repoRm } from "@/commands/repo/rm"
import { repoShow } from "@/commands/repo/show"
import { repoSources } from "@/commands/repo/sources"
import { repoSync } from "@/commands/repo/sync"
import { repoUpdate } from "@/commands/repo/update"
import { repoVerify } from "@/commands/repo/verify"
import { uninstall } from "@/commands/uninstall"
import { env } from "@/env"
import pkg from "../package.json" with { type: "json" }

interface TargetOptions {
	target?: string[]
	project?: string
}

async function main(): Promise<void> {
	consola.level = LogLevels[env.AIREPO_LOG_LEVEL]

	const program = new Command()

	program
		.name("airepo")
		.description("Local repository of AI assistant commands, skills, agents and packages")
		.version(pkg.version, "-V, --version", "Output the version number")
		.showHelpAfterError()
		.showSuggestionAfterError()

	const repo = program.command("repo").description("Manage the resource repository")

	repo.command("init")
		.description("Create the repository layout")
		.action(async () => {
			await repoInit()
		})

	repo.command("add")
		.description("Register a source and import its resources")
		.argument("<location>", "Local path, git URL, or owner/repo")
		.option("--name <name>", "Source name (derived from the location by default)")
		.option("--ref <ref>", "Branch, tag or commit for git sources")
		.option("--subpath <path>", "Only search this directory inside the source")
		.option("--force", "Overwrite resources that already exist")
		.option("--skip-existing", "Keep resources that already exist")
		.option("--dry-run", "Report what would be imported without writing")
		.action(
			async (
				location: string,
				options: {
					name?: string
					ref?: string
					subpath?: string
					force?: boolean
					skipExisting?: boolean
					dryRun?: boolean
				},
			) => {
				await repoAdd(location, {
					dryRun: Boolean(options.dryRun),
					force: Boolean(options.force),
					name: options.name,
					ref: options.ref,
					skipExisting: Boolean(options.skipExisting),
					subpath: options.subpath,
				})
			},
		)

	repo.command("remove")
		.description("Unregister a source and delete the resources it provided")
		.argument("<source>", "Source id, name, path or URL")
		.option("--keep-resources", "Keep the source's resources in the repository")
		.option("--dry-run", "Report what would be removed without writing")
		.option("-y, --yes", "Skip the confirmation prompt")
		.action(
			async (
				source: string,
				options: { keepResources?: boolean; dryRun?: boolean; yes?: boolean },
			) => {
				await repoRemove(source, {
					dryRun: Boolean(options.dryRun),
					keepResources: Boolean(options.keepResources),
					yes: Boolean(options.yes),
				})
			},
		)

	repo.command("sync")
		.description("Re-import every source and remove resources they no longer provide")
		.option("--skip-existing", "Keep existing resources instead of refreshing them")
		.option("--dry-run", "Report what would change without writing")
		.option("--no-prune", "Report orphaned resources without removing them")
		.action(async (options: { skipExisting?: boolean; dryRun?: boolean; prune: boolean }) => {
			await repoSync({
				dryRun: Boolean(options.dryRun),
				prune: options.prune,
				skipExisting: Boolean(options.skipExisting),
			})
		})

	repo.command("update")
		.description("Re-import resources from the sources recorded in their metadata")
		.argument("[refs...]", "Resource references (defaults to every resource)")
		.option("--dry-run", "Report what would be updated without writing")
		.action(async (refs: string[], options: { dryRun?: boolean }) => {
			await repoUpdate(refs, { dryRun: Boolean(options.dryRun) })
		})

	repo.command("verify")
		.description("Check that resources, metadata and packages agree")
		.argument("[type]", "command, skill, agent or package")
		.option("--json", "Print JSON")
		.action(async (type: string | undefined, options: { json?: boolean }) => {
			await repoVerify(type, { json: Boolean(options.json) })
		})

	repo.command("repair")
		.description("Write missing metadata and remove metadata without a resource")
		.option("--dry-run", "Report what would be fixed without writing")
		.action(async (options: { dryRun?: boolean }) => {
			await repoRepair({ dryRun: Boolean(options.dryRun) })
		})

	repo.command("prune")
		.description("Remove cached checkouts no source or resource refers to")
		.option("--dry-run", "Report what would be removed without writing")
		.option("-y, --yes", "Skip the confirmation prompt")
		.action(async (options: { dryRun?: boolean; yes?: boolean }) => {
			await repoPrune({ dryRun: Boolean(options.dryRun), yes: Boolean(options.yes) })
		})

	repo.command("sources")
		.description("List configured sources")
		.option("--json", "Print JSON")
		.action(async (options: { json?: boolean }) => {
			await repoSources({ json: Boolean(options.json) })
		})

	repo.command("list")
		.description("List resources in the repository")
		.argument("[type]", "command, skill, agent or package")
		.option("--json", "Print JSON")
		.action(async (type: string | undefined, options: { json?: boolean }) => {
			await repoList(type, { json: Boolean(options.json) })
		})

	repo.command("show")
		.description("Show a resource and where it came from")
		.argument("<ref>", "Resource reference, e.g. skill/pdf-tools")
		.action(async (ref: string) => {
			await repoShow(ref)
		})

	repo.command("rm")
		.description("Remove a single resource from the repository")
		.argument("<ref>", "Resource reference, e.g. command/api/deploy")
		.action(async (ref: string) => {
			await repoRm(ref)
		})

	program
		.command("install")
		.description("Link resources into a project's tool directories")
		.argument("[refs...]", "Resource references (defaults to ai.package.yaml)")
		.option("--target <tool...>", "Tools to install into")
		.option("--project <dir>", "Project directory (defaults to the current directory)")
		.action(async (refs: string[], options: TargetOptions) => {
			await install(refs, { project: options.project, target: options.target })
		})

	program
		.command("uninstall")
		.description("Remove resource links from a project's tool directories")
		.argument("<refs...>", "Resource references")
		.option("--target <tool...>", "Tools to uninstall from")
		.option("--project <dir>", "Project directory (defaults to the current directory)")
		.action(async (refs: string[], options: TargetOptions) => {
			await uninstall(refs, { project: options.project, target: options.target })
		})

	program
		.command("list-installed")
		.description("List resources linked into a project")
		.option("--target <tool...>", "Only these tools")
		.option("--project <dir>", "Project directory (defaults to the current directory)")
		.option("--json", "Print JSON")
		.action(async (options: TargetOptions & { json?: boolean }) => {
			await listInstalledCommand({
				json: Boolean(options.json),
				project: options.project,
				target: options.target,
			})
		})

	program
		.command("clean")
		.description("Remove every resource link from a project's tool directories")
		.option("--project <dir>", "Project directory (defaults to the current directory)")
		.option("--dry-run", "Report what would be removed without writing")
		.option("-y, --yes", "Skip the confirmation prompt")
		.action(async (options: { project?: string; dryRun?: boolean; yes?: boolean }) => {
			await clean({
				dryRun: Boolean(options.dryRun),
				project: options.project,
				yes: Boolean(options.yes),
			})
		})

	if (process.argv.length <= 2) {
		program.outputHelp()
		return
	}

	await program.parseAsync(process.argv)
}

main().catch((error) => {
	consola.error(error instanceof Error ? error.message : error)
	process.exit(1)
})
