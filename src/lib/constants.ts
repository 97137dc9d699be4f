import { loadEnv } from "@medusajs/framework/utils"

loadEnv(process.env.NODE_ENV || "development", process.cwd())

/**
 * (optional) Public URL for the backend
 */
export const BACKEND_URL = process.env.BACKEND_PUBLIC_URL ?? "http://localhost:9000"

/**
 * Database URL for Postgres instance used by the backend
 */
export const DATABASE_URL = process.env.DATABASE_URL

/**
 * (optional) Redis URL for Redis instance used by the backend
 */
export const REDIS_URL = process.env.REDIS_URL

/**
 * Admin CORS origins
 */
export const ADMIN_CORS = process.env.ADMIN_CORS ?? "http://localhost:7000,http://localhost:7001"

/**
 * Auth CORS origins
 */
export const AUTH_CORS = process.env.AUTH_CORS ?? "http://localhost:8000"

/**
 * Store/frontend CORS origins
 */
export const STORE_CORS = process.env.STORE_CORS ?? "http://localhost:8000"

/**
 * JWT Secret used for signing JWT tokens
 */
export const JWT_SECRET = process.env.JWT_SECRET ?? "supersecret"

/**
 * Cookie secret used for signing cookies
 */
export const COOKIE_SECRET = process.env.COOKIE_SECRET ?? "supersecret"

/**
 * Log every access policy denial (default on; set to "false" to silence)
 */
export const ACCESS_POLICY_LOG_DENIALS = process.env.ACCESS_POLICY_LOG_DENIALS !== "false"
