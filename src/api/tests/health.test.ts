import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { TestServer, createTestServer } from './utils/testHelpers';

describe('Health Check', () => {
  let setup: TestServer;

  beforeEach(async () => {
    setup = await createTestServer();
  });

  afterEach(async () => {
    await setup.cleanup();
  });

  it('should return health status with the configured steps', async () => {
    const response = await setup.server.inject({
      method: 'GET',
      url: '/health',
    });

    expect(response.statusCode).toBe(200);
    const body = JSON.parse(response.body);
    expect(body.status).toBe('ok');
    expect(body.timestamp).toBeDefined();
    expect(body.steps).toHaveLength(8);
    expect(body.steps[0]).toBe('DetectLanguage');
  });
});
