import { defineConfig } from "@medusajs/framework/utils"
import {
  ACCESS_POLICY_LOG_DENIALS,
  ADMIN_CORS,
  AUTH_CORS,
  BACKEND_URL,
  COOKIE_SECRET,
  DATABASE_URL,
  JWT_SECRET,
  REDIS_URL,
  STORE_CORS,
} from "./src/lib/constants"
import type { AccessPolicyModuleOptions } from "./src/modules/access-policy/service"

const accessPolicyOptions: AccessPolicyModuleOptions = {
  log_denials: ACCESS_POLICY_LOG_DENIALS,
}

module.exports = defineConfig({
  projectConfig: {
    databaseUrl: DATABASE_URL,
    redisUrl: REDIS_URL,
    http: {
      adminCors: ADMIN_CORS,
      authCors: AUTH_CORS,
      storeCors: STORE_CORS,
      jwtSecret: JWT_SECRET,
      cookieSecret: COOKIE_SECRET,
    },
  },
  admin: {
    backendUrl: BACKEND_URL,
    disable: true,
  },
  modules: [
    {
      resolve: "./src/modules/access-policy",
      options: accessPolicyOptions,
    },
    {
      resolve: "./src/modules/blood-donation",
    },
  ],
})
