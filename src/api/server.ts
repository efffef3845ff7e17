import express from "express";
import routes from "./routes";
import { loadConfig } from "../utils/config";

const app = express();

// Middleware
app.use(express.json({ limit: "1mb" }));

// CORS headers for development
app.use((req, res, next) => {
  res.header("Access-Control-Allow-Origin", "*");
  res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
  res.header("Access-Control-Allow-Headers", "Origin, X-Requested-With, Content-Type, Accept");
  if (req.method === "OPTIONS") {
    res.sendStatus(200);
  } else {
    next();
  }
});

// Routes
app.use("/api", routes);

// Root endpoint
app.get("/", (req, res) => {
  res.json({
    message: "Nest Egg Projection API",
    version: "1.0.0",
    endpoints: {
      projection: "POST /api/projection",
      compare: "POST /api/compare",
      resolve: "POST /api/resolve",
      health: "GET /api/health",
    },
  });
});

// Error handling middleware (malformed JSON bodies land here)
app.use((err: Error, req: express.Request, res: express.Response, next: express.NextFunction) => {
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: "Malformed JSON body", message: err.message });
    return;
  }
  console.error("Unhandled error:", err);
  res.status(500).json({
    error: "Internal server error",
    message: err.message,
  });
});

// Start server
if (require.main === module) {
  const { port } = loadConfig();
  app.listen(port, () => {
    console.log(`Server running on port ${port}`);
    console.log(`API available at http://localhost:${port}/api`);
  });
}

export default app;
