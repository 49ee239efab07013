import type { AbsolutePath, CommitSha, GitUrl, Result, ValidationError } from "@larder/core"
import type { GitError } from "../types"

/**
 * The version-control operations resolution relies on. Every failure is a
 * `GitError` carrying the operation that failed.
 */
export interface GitTransport {
	validateUri(uri: string): Result<GitUrl, ValidationError>
	clone(uri: GitUrl, destination: AbsolutePath): Promise<Result<void, GitError>>
	checkout(repoDir: AbsolutePath, pointer: string): Promise<Result<void, GitError>>
	listTags(repoDir: AbsolutePath): Promise<Result<string[], GitError>>
	resolveCurrentCommit(repoDir: AbsolutePath): Promise<Result<CommitSha, GitError>>
}
