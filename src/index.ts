import http from 'http';
import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config';
import { HuggingService } from './services/huggingService';
import { HfInferenceProvider } from './services/inferenceProvider';
import { HubDatasetLoader } from './services/datasetLoader';
import { WorkerPool } from './services/workerPool';

// Load environment variables
dotenv.config();

const config = loadConfig();

// Without a token the server still starts; capability routes answer 500
let service: HuggingService | null = null;
if (config.hfToken) {
  service = new HuggingService(
    new HfInferenceProvider(config.hfToken),
    new HubDatasetLoader(config.datasetsServerUrl, config.hfToken),
    { datasetCacheCapacity: config.datasetCacheCapacity }
  );
} else {
  console.error('HF_TOKEN not set. Please set HF_TOKEN in environment or .env file.');
}

const pool = new WorkerPool({
  size: config.workerPoolSize,
  taskTimeoutMs: config.inferenceTimeoutMs
});

const app = createApp({
  service,
  pool,
  apiKey: config.apiKey,
  clientOrigin: config.clientOrigin,
  uploadLimitBytes: config.uploadLimitBytes
});

const server = http.createServer(app);

server.listen(config.port, () => {
  console.log(`Server running on port ${config.port}`);
  console.log('Supported dataset templates:', service ? service.supported : {});
});
