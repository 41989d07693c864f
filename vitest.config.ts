import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      MILVUS_URI: 'http://milvus.test:19530',
      MILVUS_TOKEN: 'test-token',
      MILVUS_COLLECTION_NAME: 'test_collection',
      GEMINI_API_KEY: 'test-key'
    }
  }
});
