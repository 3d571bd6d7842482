import { config } from "dotenv";
import {
  catalogVocabulary,
  createAnalysisService,
  createLexiconExtractor,
  defaultAlternatives,
  defaultDrugCatalog,
  type EntityExtractor,
} from "@rxverify/analysis-engine";
import { createApp } from "./app";
import {
  loadCorsConfig,
  loadNerConfig,
  loadServerConfig,
  shouldUseHostedExtractor,
} from "./config";
import { createHostedNerExtractor } from "./ner_client";

config();

function buildExtractor(): EntityExtractor {
  const nerConfig = loadNerConfig();
  if (shouldUseHostedExtractor(nerConfig)) {
    if (!nerConfig.apiToken) {
      console.warn(
        "[ner] NER_API_TOKEN is not set; calling the inference endpoint without credentials.",
      );
    }
    return createHostedNerExtractor({
      apiUrl: nerConfig.apiUrl,
      model: nerConfig.model,
      apiToken: nerConfig.apiToken,
    });
  }
  return createLexiconExtractor(
    catalogVocabulary(defaultDrugCatalog, defaultAlternatives),
  );
}

function main(): void {
  const serverConfig = loadServerConfig();
  const service = createAnalysisService({ extractor: buildExtractor() });
  const app = createApp({
    service,
    cors: loadCorsConfig(),
    exposeErrorDetails: process.env.NODE_ENV !== "production",
  });

  const server = app.listen(serverConfig.port, serverConfig.host, () => {
    console.log(
      `[api] Listening on http://${serverConfig.host}:${serverConfig.port} (extractor: ${service.extractorName})`,
    );
  });
  server.on("error", (err) => {
    console.error("[api] Server failed to start:", err);
    process.exit(1);
  });
}

main();
