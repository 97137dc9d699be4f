import { authenticate, defineMiddlewares } from "@medusajs/framework/http"

// Signed-in customers get an auth context; everyone else passes through as anonymous
const optionalCustomerAuth = authenticate("customer", ["session", "bearer"], {
  allowUnauthenticated: true,
})

export default defineMiddlewares({
  routes: [
    {
      matcher: "/store/records*",
      middlewares: [optionalCustomerAuth],
    },
    {
      matcher: "/store/access*",
      middlewares: [optionalCustomerAuth],
    },
  ],
})
