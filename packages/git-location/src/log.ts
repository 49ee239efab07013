import { consola } from "consola"
import { env } from "./env"

export const logger = consola.withTag("git-location")
logger.level = env.LARDER_LOG_LEVEL
