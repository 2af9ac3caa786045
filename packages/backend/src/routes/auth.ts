import { Router } from "express";
import type { AuthLoginResponse, AuthMeResponse } from "@regintel/shared";

// Authentication is not implemented; these keep the interface's calls answered.
export function createAuthRouter(): Router {
  const authRouter = Router();

  authRouter.get("/me", (_req, res) => {
    const response: AuthMeResponse = { user: null, authenticated: false };
    res.json(response);
  });

  authRouter.get("/login", (_req, res) => {
    const response: AuthLoginResponse = { message: "Login functionality coming soon" };
    res.json(response);
  });

  return authRouter;
}
