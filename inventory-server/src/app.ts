// Express application: the homepage route and the error fallback.
import express from "express";

export const HOME_PAGE_BODY = "Inventory System Home Page";

export const errorHandler: express.ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }
  console.error("Unhandled request error:", err);
  return res.status(500).json({ error: "Internal server error" });
};

// Unknown paths fall through to Express's default 404.
export const createApp = () => {
  const app = express();

  app.get("/", (_req, res) => {
    return res.status(200).send(HOME_PAGE_BODY);
  });

  app.use(errorHandler);
  return app;
};
