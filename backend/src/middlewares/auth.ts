import { type NextFunction, type Request, type Response } from "express";
import jwt, { type JwtPayload } from "jsonwebtoken";
import { HttpError } from "../utils/httpError";

/** Dashboard bearer tokens are issued elsewhere; this only verifies them (HS256). */
export function requireAuth(jwtSecret: string) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      next(new HttpError(401, "Missing bearer token"));
      return;
    }

    const token = authHeader.slice("Bearer ".length);
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, jwtSecret, { algorithms: ["HS256"] });
    } catch {
      next(new HttpError(401, "Invalid token"));
      return;
    }
    if (typeof decoded === "string" || typeof decoded.sub !== "string") {
      next(new HttpError(401, "Invalid token"));
      return;
    }
    req.authUser = {
      id: decoded.sub,
      email: typeof decoded.email === "string" ? decoded.email : ""
    };
    next();
  };
}
