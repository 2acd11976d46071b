import { timingSafeEqual } from "node:crypto";
import type { FastifyInstance, FastifyRequest } from "fastify";

function extractToken(req: FastifyRequest): string | null {
  const auth = req.headers.authorization ?? "";
  if (auth.toLowerCase().startsWith("bearer ")) return auth.slice(7).trim() || null;

  const x = req.headers["x-tr-token"];
  if (typeof x === "string" && x.trim()) return x.trim();
  return null;
}

function tokensEqual(a: string, b: string): boolean {
  const ab = Buffer.from(a, "utf8");
  const bb = Buffer.from(b, "utf8");
  return ab.length === bb.length && timingSafeEqual(ab, bb);
}

export function addAuthGuard(
  app: FastifyInstance,
  token: string,
  opts?: { onlyPrefixes?: string[]; exceptPaths?: string[] },
): void {
  const only = opts?.onlyPrefixes?.length ? opts.onlyPrefixes : null;
  const except = new Set(opts?.exceptPaths ?? []);
  app.addHook("preHandler", async (req, reply) => {
    // Match on the route pattern, not the raw URL: the router decodes the path first.
    const route = req.routeOptions.url;
    if (route == null) return;
    if (except.has(route)) return;
    if (only && !only.some((p) => route === p || route.startsWith(`${p}/`))) return;

    const tok = extractToken(req);
    if (!tok || !tokensEqual(tok, token)) {
      return reply.code(401).send({ ok: false, error: "unauthorized" });
    }
  });
}
