import { NextFunction, Request, RequestHandler, Response } from "express";
import { ErrorResponse } from "../controllers/v1/types";

export function wrap<P, ResBody, ReqBody>(
  controller: (
    req: Request<P, ResBody, ReqBody>,
    res: Response<ResBody>,
  ) => Promise<unknown>,
): RequestHandler<P, ResBody, ReqBody> {
  return (req, res, next) => {
    controller(req, res).catch(err => next(err));
  };
}

/** Admin routes carry their key in the path; anything else is a 404. */
export function adminKeyMiddleware(adminKey: string | undefined) {
  return (
    req: Request<{ key: string }>,
    res: Response<ErrorResponse>,
    next: NextFunction,
  ) => {
    if (!adminKey || req.params.key !== adminKey) {
      return res.status(404).json({ success: false, error: "Not found" });
    }
    next();
  };
}
