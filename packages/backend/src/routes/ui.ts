import { Router } from "express";

interface CreateUiRouterOptions {
  templatePath: string;
}

export function createUiRouter(options: CreateUiRouterOptions): Router {
  const uiRouter = Router();

  uiRouter.get("/", (_req, res, next) => {
    res.sendFile(options.templatePath, (error) => {
      if (error) {
        next(error);
      }
    });
  });

  return uiRouter;
}
