import path from "node:path"
import dotenv from "dotenv"
import { z } from "zod"

const str = () => z.string().trim().min(1)

export const schema = z.object({
	LARDER_GIT_BINARY: str().default("git"),
	LARDER_GIT_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(300_000),
	LARDER_LOG_LEVEL: z.coerce.number().int().min(0).max(5).optional().default(3),
	LARDER_TMPDIR: str()
		.refine((value) => path.isAbsolute(value), "LARDER_TMPDIR must be absolute")
		.optional(),
})

export type Env = z.infer<typeof schema>

export function parseEnv(source: Record<string, string | undefined>): Env {
	return schema.parse(source)
}

const dotenvResult = dotenv.config({ path: path.resolve(process.cwd(), ".env") })

export const env = parseEnv({
	...(dotenvResult.parsed ?? {}),
	...process.env,
})
