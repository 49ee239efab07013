import { execFile } from "node:child_process"
import { mkdir } from "node:fs/promises"
import path from "node:path"
import { promisify } from "node:util"
import type { AbsolutePath, CommitSha, GitUrl, Result, ValidationError } from "@larder/core"
import { coerceCommitSha, coerceGitUrl, manualValidationError, toRawError } from "@larder/core"
import { env } from "../env"
import type { GitError, GitOperation } from "../types"
import type { GitTransport } from "./types"

const execFileAsync = promisify(execFile)

export interface GitRunOptions {
	cwd?: string
	timeout: number
	env: NodeJS.ProcessEnv
}

export type GitRunner = (
	binary: string,
	args: string[],
	options: GitRunOptions,
) => Promise<{ stdout: string; stderr: string }>

export interface ExecGitTransportOptions {
	binary?: string
	timeoutMs?: number
	run?: GitRunner
}

const defaultRunner: GitRunner = async (binary, args, options) => {
	const { stdout, stderr } = await execFileAsync(binary, args, {
		cwd: options.cwd,
		encoding: "utf8",
		env: options.env,
		maxBuffer: 16 * 1024 * 1024,
		timeout: options.timeout,
	})
	return { stderr, stdout }
}

/**
 * Transport that shells out to the git executable using argv arrays.
 */
export function createExecGitTransport(options: ExecGitTransportOptions = {}): GitTransport {
	const binary = options.binary ?? env.LARDER_GIT_BINARY
	const timeout = options.timeoutMs ?? env.LARDER_GIT_TIMEOUT_MS
	const run = options.run ?? defaultRunner

	async function git(
		operation: GitOperation,
		source: string,
		args: string[],
		cwd?: string,
	): Promise<Result<string, GitError>> {
		try {
			const { stdout } = await run(binary, args, {
				cwd,
				env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
				timeout,
			})
			return { ok: true, value: stdout }
		} catch (error) {
			return {
				error: {
					message: `git ${args.join(" ")} failed.`,
					operation,
					rawError: toRawError(error),
					source,
					stderr: readStderr(error),
					type: "git",
				},
				ok: false,
			}
		}
	}

	return {
		async checkout(repoDir, pointer) {
			const result = await git("checkout", repoDir, ["checkout", "--quiet", pointer], repoDir)
			return result.ok ? { ok: true, value: undefined } : result
		},

		async clone(uri, destination) {
			try {
				await mkdir(path.dirname(destination), { recursive: true })
			} catch (error) {
				return {
					error: {
						message: `Unable to create ${path.dirname(destination)}.`,
						operation: "clone",
						rawError: toRawError(error),
						source: uri,
						type: "git",
					},
					ok: false,
				}
			}

			const result = await git("clone", uri, ["clone", "--quiet", uri, destination])
			return result.ok ? { ok: true, value: undefined } : result
		},

		async listTags(repoDir) {
			const result = await git("list_tags", repoDir, ["tag", "--list"], repoDir)
			if (!result.ok) {
				return result
			}

			return {
				ok: true,
				value: result.value
					.split("\n")
					.map((line) => line.trim())
					.filter((line) => line.length > 0),
			}
		},

		async resolveCurrentCommit(repoDir) {
			const result = await git("rev_parse", repoDir, ["rev-parse", "HEAD"], repoDir)
			if (!result.ok) {
				return result
			}

			return parseCommit(result.value, repoDir)
		},

		validateUri,
	}
}

export function validateUri(uri: string): Result<GitUrl, ValidationError> {
	const coerced = coerceGitUrl(uri)
	if (!coerced) {
		return {
			error: manualValidationError("git", `'${uri}' is not a valid git URI.`),
			ok: false,
		}
	}
	return { ok: true, value: coerced }
}

function parseCommit(output: string, repoDir: AbsolutePath): Result<CommitSha, GitError> {
	const commit = coerceCommitSha(output)
	if (!commit) {
		return {
			error: {
				message: `git rev-parse returned an unexpected value: "${output.trim()}".`,
				operation: "rev_parse",
				source: repoDir,
				type: "git",
			},
			ok: false,
		}
	}
	return { ok: true, value: commit }
}

function readStderr(error: unknown): string | undefined {
	if (typeof error === "object" && error !== null && "stderr" in error) {
		const stderr = (error as { stderr?: unknown }).stderr
		if (typeof stderr === "string" && stderr.trim()) {
			return stderr.trim()
		}
	}
	return undefined
}
