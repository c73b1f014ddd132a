import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import fp from "fastify-plugin";
import fjwt from "@fastify/jwt";

export const AUTH_ROLES = ["admin", "editor", "viewer"] as const;
export type AuthRole = (typeof AUTH_ROLES)[number];

interface AuthUser {
  userId: string;
  email: string;
  name: string;
  role: AuthRole;
}

// ─── Type augmentations ─────────────────────────────────────────────

declare module "fastify" {
  interface FastifyInstance {
    authenticate: (
      request: FastifyRequest,
      reply: FastifyReply,
    ) => Promise<FastifyReply | undefined>;
  }
}

declare module "@fastify/jwt" {
  interface FastifyJWT {
    payload: AuthUser;
    user: AuthUser;
  }
}

// ─── Auth plugin ────────────────────────────────────────────────────

export interface AuthPluginOptions {
  secret: string;
}

async function auth(app: FastifyInstance, opts: AuthPluginOptions) {
  await app.register(fjwt, { secret: opts.secret });

  // Applied per route: the chat and query endpoints stay public.
  app.decorate("authenticate", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      await request.jwtVerify();
      return undefined;
    } catch (err) {
      request.log.debug({ err }, "Bearer token rejected");
      return reply.status(401).send({ error: "Unauthorized" });
    }
  });
}

export const authPlugin = fp(auth, { name: "auth" });

// ─── Role-based preHandler factory ──────────────────────────────────

export function requireRole(...roles: AuthRole[]) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (!roles.includes(request.user.role)) {
      return reply.status(403).send({ error: "Forbidden: insufficient role" });
    }
    return undefined;
  };
}

// ─── Test helper: create a signed JWT ───────────────────────────────

export function createTestToken(
  app: FastifyInstance,
  overrides: Partial<AuthUser> = {},
): string {
  return app.jwt.sign({
    userId: overrides.userId ?? "test-user-id",
    email: overrides.email ?? "test@example.com",
    name: overrides.name ?? "Test User",
    role: overrides.role ?? "admin",
  });
}
