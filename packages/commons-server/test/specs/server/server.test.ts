import { deepStrictEqual, match, strictEqual } from 'node:assert';
import { after, before, describe, it } from 'node:test';
import type { WebhookResult } from '../../../src/libs/engine/webhook-dispatcher';
import { ConfmockServer } from '../../../src/libs/server/server';
import { ServerErrorCodes } from '../../../src/types/server.types';
import { FakeWebhookTransport, fixedGenerators } from '../../libs/routes';
import {
  readBody,
  startTestServer,
  stopTestServer,
  waitForTransaction
} from '../../libs/server';

const messagesPath = '/messenger/v1/accounts/7/chats/abc/messages';

describe('Server should answer from the route table', () => {
  const transport = new FakeWebhookTransport();
  let testServer: ConfmockServer;
  let baseUrl: string;

  before(async () => {
    ({ server: testServer, baseUrl } = await startTestServer(
      {},
      { transport, generators: fixedGenerators }
    ));
  });

  after(async () => {
    await stopTestServer(testServer);
  });

  it('should answer the health check', async () => {
    const response = await fetch(`${baseUrl}/health`);

    strictEqual(response.status, 200);
    deepStrictEqual(await response.json(), { status: 'ok' });
  });

  it('should issue a token from a form body', async () => {
    const response = await fetch(`${baseUrl}/token`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: 'grant_type=authorization_code&client_id=client&client_secret=test-secret&code=012345'
    });

    strictEqual(response.status, 200);
    deepStrictEqual(await response.json(), {
      access_token: 'access-token-1',
      expires_in: 86400,
      refresh_token: 'refresh-token-1',
      scope: 'messenger:read,messenger:write',
      token_type: 'Bearer'
    });
  });

  it('should list the conditionally required fields that are missing', async () => {
    const response = await fetch(`${baseUrl}/token`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: 'grant_type=authorization_code&client_id=client&client_secret=test-secret'
    });

    strictEqual(response.status, 400);
    deepStrictEqual(await response.json(), {
      status: 'validation_failed',
      message: 'Request validation failed: code',
      errors: [
        {
          field: 'code',
          reason: 'conditional-required',
          message: 'code is required when grant_type is "authorization_code"'
        }
      ]
    });
  });

  it('should reject a body of the wrong content type', async () => {
    const response = await fetch(`${baseUrl}/token`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ grant_type: 'refresh_token' })
    });

    strictEqual(response.status, 400);
    deepStrictEqual(await response.json(), {
      status: 'content_type_mismatch',
      message:
        'Expected content type application/x-www-form-urlencoded, received application/json'
    });
  });

  it('should reject a malformed JSON body', async () => {
    const response = await fetch(`${baseUrl}/ratings/v1/answer`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"message": '
    });
    const body = await readBody(response);

    strictEqual(response.status, 400);
    strictEqual(body.status, 'invalid_body');
    match(body.message, /^Malformed JSON body: /);
  });

  it('should redirect with the echoed code and state', async () => {
    const query = 'response_type=code&client_id=client&scope=messenger:read';
    const response = await fetch(
      `${baseUrl}/oauth?${query}&code=auth-1&state=xyz`,
      { redirect: 'manual' }
    );

    strictEqual(response.status, 302);
    strictEqual(
      response.headers.get('location'),
      'http://localhost:3000/callback?code=auth-1&state=xyz'
    );

    const withoutCode = await fetch(`${baseUrl}/oauth?${query}&state=xyz`, {
      redirect: 'manual'
    });

    strictEqual(
      withoutCode.headers.get('location'),
      'http://localhost:3000/callback?state=xyz'
    );
  });

  it('should validate the query string of GET requests', async () => {
    const response = await fetch(`${baseUrl}/oauth?response_type=token`, {
      redirect: 'manual'
    });
    const body = await readBody(response);

    strictEqual(response.status, 400);
    deepStrictEqual(
      body.errors.map((error: { field: string }) => error.field),
      ['client_id', 'scope', 'response_type']
    );
  });

  it('should synthesize a message with typed and generated values', async () => {
    const response = await fetch(`${baseUrl}${messagesPath}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ message: { text: 'hello' }, type: 'text' })
    });
    const body = await readBody(response);

    strictEqual(response.status, 200);
    strictEqual(body.created, 1700000000);
    strictEqual(body.direction, 'out');
    deepStrictEqual(body.content, { text: 'hello' });
    match(body.id, /^[0-9a-f]{32}$/);
  });

  it('should answer an empty object when deleting a message', async () => {
    const response = await fetch(`${baseUrl}${messagesPath}/m-1`, {
      method: 'DELETE'
    });

    strictEqual(response.status, 200);
    deepStrictEqual(await response.json(), {});
  });

  it('should coerce path parameters in typed values', async () => {
    const response = await fetch(`${baseUrl}${messagesPath}/image`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ image_id: 'img-1' })
    });
    const body = await readBody(response);

    strictEqual(response.status, 200);
    strictEqual(body.author_id, 7);
    strictEqual(body.type, 'image');
  });

  it('should tell apart paths with and without a trailing slash', async () => {
    const listPath = '/messenger/v3/accounts/7/chats/abc/messages';
    const withSlash = await fetch(`${baseUrl}${listPath}/?limit=10`);
    const withoutSlash = await fetch(`${baseUrl}${listPath}?limit=10`);

    strictEqual(withSlash.status, 200);
    strictEqual((await readBody(withSlash))[0].author_id, 7);
    strictEqual(withoutSlash.status, 404);
    deepStrictEqual(await withoutSlash.json(), {
      status: 'no_route_match',
      message: `No route matches ${listPath}`
    });
  });

  it('should answer 405 with the allowed methods', async () => {
    const response = await fetch(`${baseUrl}/token`, { method: 'PUT' });

    strictEqual(response.status, 405);
    strictEqual(response.headers.get('allow'), 'POST');
    deepStrictEqual(await response.json(), {
      status: 'method_not_allowed',
      message: 'Method PUT is not allowed for /token'
    });
  });

  it('should answer HEAD requests on GET routes without a body', async () => {
    const response = await fetch(`${baseUrl}/ratings/v1/reviews`, {
      method: 'HEAD'
    });

    strictEqual(response.status, 200);
    strictEqual(await response.text(), '');
  });

  it('should answer browser housekeeping paths with 204', async () => {
    const response = await fetch(`${baseUrl}/favicon.ico`);

    strictEqual(response.status, 204);
  });

  it('should fire the webhook selected by the request', async () => {
    const dispatched = new Promise<WebhookResult>((resolve) => {
      testServer.once('webhook-dispatched', resolve);
    });
    const response = await fetch(
      `${baseUrl}/api/webhooks/trigger?type=user_created&webhook_url=${encodeURIComponent(
        'http://localhost:9000/hooks'
      )}`
    );

    strictEqual(response.status, 200);
    deepStrictEqual(await response.json(), {
      status: 'success',
      message: 'Webhook отправлен'
    });

    const result = await dispatched;

    strictEqual(result.event, 'user_created');
    strictEqual(result.status, 200);
    deepStrictEqual(transport.requests.at(-1), {
      url: 'http://localhost:9000/hooks',
      method: 'POST',
      headers: {},
      body: {
        event: 'user.created',
        timestamp: 1700000000,
        data: { user_id: 'session-1', email: 'user@example.com' }
      }
    });
  });

  it('should reject an unknown webhook type before firing anything', async () => {
    const sent = transport.requests.length;
    const response = await fetch(
      `${baseUrl}/api/webhooks/trigger?type=deleted&webhook_url=http://localhost:9000`
    );

    strictEqual(response.status, 400);
    strictEqual((await readBody(response)).errors[0].reason, 'enum');
    strictEqual(transport.requests.length, sent);
  });

  it('should expose the latest transactions', async () => {
    const recorded = waitForTransaction(testServer, '/ratings/v1/reviews');

    await (
      await fetch(`${baseUrl}/ratings/v1/reviews`, {
        headers: { Authorization: 'Bearer test-secret' }
      })
    ).json();
    await recorded;

    const response = await fetch(`${baseUrl}/__admin/logs?lines=1`);
    const logs = await readBody(response);

    strictEqual(response.status, 200);
    strictEqual(logs.length, 1);
    strictEqual(logs[0].request.method, 'GET');
    strictEqual(logs[0].request.urlPath, '/ratings/v1/reviews');
    strictEqual(logs[0].routePath, '/ratings/v1/reviews');
    strictEqual(logs[0].response.statusCode, 200);
    strictEqual(logs[0].response.body.total, 35);
    deepStrictEqual(
      logs[0].request.headers.find(
        (header: { key: string }) => header.key === 'authorization'
      ),
      { key: 'authorization', value: 'Bearer ***' }
    );
  });
});

describe('Server options', () => {
  it('should not serve the admin endpoints when disabled', async () => {
    const { server, baseUrl } = await startTestServer({ enableAdminApi: false });

    try {
      const response = await fetch(`${baseUrl}/__admin/logs`);

      strictEqual(response.status, 404);
    } finally {
      await stopTestServer(server);
    }
  });

  it('should keep only the configured number of transactions', async () => {
    const { server, baseUrl } = await startTestServer({ maxTransactionLogs: 2 });

    try {
      for (const path of ['/a', '/b', '/c']) {
        const recorded = waitForTransaction(server, path);
        await (await fetch(`${baseUrl}${path}`)).json();
        await recorded;
      }

      deepStrictEqual(
        server.getTransactionLogs().map((log) => log.request.urlPath),
        ['/c', '/b']
      );
    } finally {
      await stopTestServer(server);
    }
  });

  it('should report a port already in use', async () => {
    const { server, baseUrl } = await startTestServer();
    const port = Number(new URL(baseUrl).port);

    try {
      const duplicate = new ConfmockServer([], { hostname: '127.0.0.1', port });
      const errorCode = await new Promise<ServerErrorCodes>((resolve) => {
        duplicate.once('error', (code) => resolve(code));
        duplicate.start();
      });

      strictEqual(errorCode, ServerErrorCodes.PORT_ALREADY_USED);
    } finally {
      await stopTestServer(server);
    }
  });
});
