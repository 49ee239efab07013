import type { AbsolutePath, CommitSha, Result } from "@larder/core"
import type { GitTransport } from "../transport/types"
import type { GitError, PointerState } from "../types"

export type FinalizedPointer = Omit<PointerState, "ref"> & { readonly ref: CommitSha }

export function effectivePointer(state: PointerState): string | undefined {
	return state.ref ?? state.branch
}

/**
 * Checks out the effective pointer and pins `ref` to the commit now at HEAD.
 * `branch` survives only when it is literally what was checked out.
 */
export async function checkoutAndFinalize(
	transport: GitTransport,
	cloneDir: AbsolutePath,
	state: PointerState,
): Promise<Result<FinalizedPointer, GitError>> {
	const pointer = effectivePointer(state)
	if (pointer !== undefined) {
		const checkout = await transport.checkout(cloneDir, pointer)
		if (!checkout.ok) {
			return checkout
		}
	}

	const commit = await transport.resolveCurrentCommit(cloneDir)
	if (!commit.ok) {
		return commit
	}

	return {
		ok: true,
		value: {
			...state,
			branch: state.branch !== undefined && state.branch === pointer ? state.branch : undefined,
			ref: commit.value,
		},
	}
}
