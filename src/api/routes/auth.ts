/**
 * Account endpoints: registration, login, logout, profile, CSRF token
 */

import { Hono } from "hono";
import { deleteCookie, setCookie } from "hono/cookie";
import { z } from "zod";
import { CSRF_COOKIE, csrfTokenFor } from "../../auth/csrf";
import { UnauthenticatedError } from "../../auth/errors";
import { ACCESS_TOKEN_COOKIE, extractCredential, getPrincipal, requireAuth } from "../../auth/middleware";
import { createLogger } from "../../logging";
import { ApiError } from "../error-codes";
import { apiError, validateBody } from "../middleware";
import { operationResponse } from "../responses";
import { currentUser, toPublicUser, type RouteDeps } from "./deps";

const log = createLogger("auth-routes");

const passwordSchema = z.string().min(8).max(128);

const registerSchema = z.object({
  username: z
    .string()
    .trim()
    .min(3)
    .max(50)
    .regex(/^[A-Za-z0-9_.-]+$/, "Username may contain letters, numbers, dot, underscore and hyphen"),
  email: z.string().trim().toLowerCase().email(),
  password: passwordSchema,
  fullName: z.string().trim().max(255).nullish(),
});

const loginSchema = z.object({
  /** Username or email */
  username: z.string().trim().min(1).max(255),
  password: z.string().min(1).max(128),
});

const updateProfileSchema = z.object({
  fullName: z.string().trim().max(255).nullish(),
  email: z.string().trim().toLowerCase().email().optional(),
});

const changePasswordSchema = z.object({
  currentPassword: z.string().min(1).max(128),
  newPassword: passwordSchema,
});

export function authRoutes(deps: RouteDeps): Hono {
  const { storage, auth, session } = deps;
  const app = new Hono();
  const requireUser = requireAuth(auth.resolver);

  const cookieOptions = {
    path: "/",
    secure: session.secureCookies,
    sameSite: "Lax",
    maxAge: session.ttlSeconds,
  } as const;

  app.post("/register", async (c) => {
    const body = await validateBody(c, registerSchema);

    const taken = await storage.users.existsWithUsernameOrEmail(body.username, body.email);
    if (taken.username) {
      throw apiError(ApiError.ALREADY_EXISTS, "Username already registered");
    }
    if (taken.email) {
      throw apiError(ApiError.ALREADY_EXISTS, "Email already registered");
    }

    const user = await storage.users.create({
      username: body.username,
      email: body.email,
      passwordHash: await auth.passwords.hash(body.password),
      fullName: body.fullName ?? null,
    });

    log.info("User registered", { userId: user.id, username: user.username });
    return c.json(toPublicUser(user), 201);
  });

  app.post("/login", async (c) => {
    const body = await validateBody(c, loginSchema);

    const user = await storage.users.findByLogin(body.username);
    if (!user) {
      await auth.passwords.verifyDummy(body.password);
      log.info("Login failed", { reason: "unknown_user" });
      throw new UnauthenticatedError();
    }

    const passwordMatches = await auth.passwords.verify(body.password, user.passwordHash);
    if (!passwordMatches || !user.isActive) {
      log.info("Login failed", { userId: user.id, reason: passwordMatches ? "inactive" : "wrong_password" });
      throw new UnauthenticatedError();
    }

    const issued = await auth.sessions.issue(user);
    const csrfToken = csrfTokenFor(session.secret, issued.token);

    setCookie(c, ACCESS_TOKEN_COOKIE, issued.token, { ...cookieOptions, httpOnly: true });
    setCookie(c, CSRF_COOKIE, csrfToken, cookieOptions);

    log.info("User logged in", { userId: user.id });
    return c.json({
      token: issued.token,
      tokenType: "Bearer",
      expiresAt: issued.expiresAt.toISOString(),
      csrfToken,
      user: toPublicUser(user),
    });
  });

  app.post("/logout", requireUser, async (c) => {
    const principal = getPrincipal(c);
    const credential = extractCredential(c);

    if (principal.source === "session" && credential) {
      await auth.sessions.revoke(credential.value);
    }

    deleteCookie(c, ACCESS_TOKEN_COOKIE, { path: "/" });
    deleteCookie(c, CSRF_COOKIE, { path: "/" });

    log.info("User logged out", { userId: principal.userId, source: principal.source });
    return operationResponse(c, "Logged out");
  });

  app.get("/me", requireUser, async (c) => {
    return c.json(toPublicUser(await currentUser(c, storage)));
  });

  app.put("/me", requireUser, async (c) => {
    const body = await validateBody(c, updateProfileSchema);
    const user = await currentUser(c, storage);

    if (body.email && body.email !== user.email) {
      // Usernames cannot contain "@", so this only ever matches on email
      const holder = await storage.users.findByLogin(body.email);
      if (holder && holder.id !== user.id) {
        throw apiError(ApiError.ALREADY_EXISTS, "Email already registered");
      }
    }

    const updated = await storage.users.updateProfile(user.id, {
      ...(body.fullName !== undefined && { fullName: body.fullName }),
      ...(body.email !== undefined && { email: body.email }),
    });
    if (!updated) {
      throw apiError(ApiError.NOT_FOUND, "User not found");
    }
    return c.json(toPublicUser(updated));
  });

  app.post("/change-password", requireUser, async (c) => {
    const body = await validateBody(c, changePasswordSchema);
    const user = await currentUser(c, storage);

    if (!(await auth.passwords.verify(body.currentPassword, user.passwordHash))) {
      throw apiError(ApiError.INVALID_PASSWORD);
    }

    await storage.users.updatePassword(user.id, await auth.passwords.hash(body.newPassword));
    log.info("Password changed", { userId: user.id });
    return operationResponse(c, "Password updated");
  });

  app.get("/csrf", requireUser, (c) => {
    const credential = extractCredential(c);
    if (getPrincipal(c).source !== "session" || !credential) {
      throw apiError(ApiError.VALIDATION_ERROR, "CSRF tokens are issued to session logins only");
    }

    const csrfToken = csrfTokenFor(session.secret, credential.value);
    setCookie(c, CSRF_COOKIE, csrfToken, cookieOptions);
    return c.json({ csrfToken });
  });

  return app;
}
