import cors from "cors";
import { type Express } from "express";
import helmet from "helmet";

export interface SecurityOptions {
  production: boolean;
  allowedOrigins: string[];
}

export function setupSecurity(app: Express, options: SecurityOptions) {
  const allowedOrigins = new Set(options.allowedOrigins.filter(Boolean));

  app.use(
    helmet({
      contentSecurityPolicy: options.production
        ? {
            useDefaults: true,
            directives: {
              "script-src": ["'self'"],
              "connect-src": ["'self'", ...Array.from(allowedOrigins)],
              "img-src": ["'self'", "data:"],
            },
          }
        : false,
      // Screenshots are embedded by the front end on another origin
      crossOriginResourcePolicy: { policy: "cross-origin" },
    }),
  );

  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowedOrigins.has(origin)) {
          return callback(null, true);
        }
        return callback(new Error(`Origin ${origin} not allowed by CORS`));
      },
      credentials: true,
      methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type"],
      exposedHeaders: ["Content-Disposition"],
    }),
  );
}
