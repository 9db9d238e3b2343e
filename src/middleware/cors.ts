import cors from "cors";

export const corsMiddleware = (frontendUrl: string) =>
  cors({
    origin: frontendUrl || true,
    methods: ["GET", "POST", "PUT", "OPTIONS"],
    allowedHeaders: ["Content-Type", "x-api-key", "x-principal"],
  });
