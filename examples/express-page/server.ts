import express from "express";
import {
  createFileHasher,
  createLogger,
  loadConfigFromEnv,
  render,
} from "../../src/core";
import { icons, scripts, setAnalytics, styles } from "./resources";

const config = loadConfigFromEnv({ dotenv: true });
const logger = createLogger({ level: config.logLevel });
// Shared across requests so production digests are computed once
const hasher = createFileHasher();

const app = express();

app.use("/static", express.static(`${__dirname}/static`));

app.get("/", (req, res) => {
  setAnalytics(req.query.analytics === "1");

  const head = render([icons, styles], { config, hasher, logger, graceful: true });
  const body = render(scripts, { config, hasher, logger, graceful: true });

  res.type("html").send(
    [
      "<!doctype html>",
      "<html>",
      "<head>",
      head,
      "</head>",
      "<body>",
      "<h1>Hello</h1>",
      body,
      "</body>",
      "</html>",
    ].join("\n")
  );
});

const port = Number(process.env.PORT ?? 3000);
app.listen(port, () => {
  logger.info(`Listening on http://localhost:${port} (development: ${config.development})`);
});
