// ── Bootstrap ──────────────────────────────────────────────────────────────────
// Static imports are hoisted and evaluated before any code in this module, so a
// module that throws on load (env.ts on a missing variable) would run before the
// crash handlers exist. Everything is therefore loaded with dynamic import()
// after the handlers are registered.

process.on("uncaughtException", (err) => {
  console.error("UNCAUGHT EXCEPTION, process will exit:");
  console.error(err);
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  console.error("UNHANDLED REJECTION, process will exit:");
  console.error(reason);
  process.exit(1);
});

console.log("[startup] Process starting, registering crash handlers...");
console.log(`[startup] Node ${process.version}, platform: ${process.platform}, arch: ${process.arch}`);
console.log(`[startup] PORT env = ${process.env.PORT ?? "(not set)"}`);

async function main() {
  console.log("[startup] Loading modules...");

  const [
    { default: express },
    { default: cors },
    { default: multer },
    { env },
    { default: smsRoutes },
    { default: transactionRoutes },
    { SmsBackupFormatError },
  ] = await Promise.all([
    import("express"),
    import("cors"),
    import("multer"),
    import("./config/env.js"),
    import("./routes/sms.js"),
    import("./routes/transactions.js"),
    import("./services/smsBackup.js"),
  ]);

  console.log("[startup] All modules loaded successfully.");

  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: env.maxUploadBytes }));

  // Request logging in development
  if (env.isDev) {
    app.use((req, _res, next) => {
      console.log(`${req.method} ${req.path}`);
      next();
    });
  }

  // Routes
  app.use("/api/sms", smsRoutes);
  app.use("/api", transactionRoutes);

  // Root health check
  app.get("/", (_req, res) => {
    res.json({
      name: "MoMo Ledger Backend",
      version: "1.0.0",
      status: "running",
      port: env.port,
      endpoints: {
        ingest: "/api/sms/ingest",
        upload: "/api/sms/upload",
        health: "/api/sms/health",
        transactions: "/api/transactions",
        statistics: "/api/statistics",
        unprocessed: "/api/unprocessed",
      },
    });
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  // Error handler; upload rejections from multer land here
  app.use(((err: Error, _req: import("express").Request, res: import("express").Response, _next: import("express").NextFunction) => {
    if (err instanceof multer.MulterError || err instanceof SmsBackupFormatError) {
      res.status(400).json({ success: false, error: err.message });
      return;
    }
    console.error("Unhandled error:", err);
    res.status(500).json({
      error: "Internal server error",
      message: env.isDev ? err.message : undefined,
    });
  }) as import("express").ErrorRequestHandler);

  const host = "0.0.0.0";
  const server = app.listen(env.port, host, () => {
    console.log(`[startup] Server listening on http://${host}:${env.port}`);
    console.log(`[startup] Environment: ${env.nodeEnv}`);
  });

  server.on("error", (err) => {
    console.error("Server failed to start:", err);
    process.exit(1);
  });
}

main().catch((err) => {
  console.error("FATAL: Failed during app initialization:");
  console.error(err);
  process.exit(1);
});
