import request from 'supertest';
import {
  closeTestApp,
  createTestApp,
  resetTestState,
  TestContext,
} from '../helpers/test-app.helper';
import { authHeader, createTestAdmin, createTestUser, TestUser } from '../helpers/auth-mock.helper';

describe('Instance config (Integration)', () => {
  let context: TestContext;
  let admin: TestUser;

  beforeAll(async () => {
    context = await createTestApp();
  });

  afterAll(async () => {
    await closeTestApp(context);
  });

  beforeEach(() => {
    resetTestState(context);
    admin = createTestAdmin(context);
  });

  function patch(body: object, ifMatch?: string) {
    const req = request(context.app.getHttpServer())
      .patch('/api/instance-config')
      .set(authHeader(admin.accessToken));
    return ifMatch === undefined ? req.send(body) : req.set('If-Match', ifMatch).send(body);
  }

  describe('GET /api/instance-config', () => {
    it('should create the default config from the initial admin list', async () => {
      const response = await request(context.app.getHttpServer())
        .get('/api/instance-config')
        .set(authHeader(admin.accessToken))
        .expect(200);

      expect(response.body.data).toMatchObject({
        instanceName: 'test-instance',
        admins: ['test-admin'],
        requireAdminPrivileges: true,
        version: 1,
      });
    });

    it('should return 403 for a non-admin', async () => {
      const user = createTestUser(context, 'test-user');

      await request(context.app.getHttpServer())
        .get('/api/instance-config')
        .set(authHeader(user.accessToken))
        .expect(403);
    });
  });

  describe('PATCH /api/instance-config', () => {
    it('should update the admin list and bump the version', async () => {
      const response = await patch({ admins: ['test-admin', 'test-user'] }).expect(200);

      expect(response.body.data.admins).toEqual(['test-admin', 'test-user']);
      expect(response.body.data.version).toBe(2);

      const user = createTestUser(context, 'test-user');
      await request(context.app.getHttpServer())
        .get('/api/instance-config')
        .set(authHeader(user.accessToken))
        .expect(200);
    });

    it('should apply a write whose If-Match equals the stored version', async () => {
      const response = await patch({ requireAdminPrivileges: false }, '"1"').expect(200);

      expect(response.body.data.requireAdminPrivileges).toBe(false);
      expect(response.body.data.version).toBe(2);
    });

    it('should return 409 when If-Match is stale', async () => {
      await patch({ requireAdminPrivileges: true }, '1').expect(200);

      const response = await patch({ requireAdminPrivileges: false }, '1').expect(409);

      expect(response.body.code).toBe('CONFLICT');
    });

    it('should return 400 for a non-numeric If-Match', async () => {
      await patch({ requireAdminPrivileges: false }, 'abc').expect(400);
    });

    it('should reject unknown keys', async () => {
      await patch({ owner: 'someone' }).expect(400);
    });

    it('should lock everyone out when admins is set to null', async () => {
      await patch({ admins: null }).expect(200);

      const response = await request(context.app.getHttpServer())
        .get('/api/instance-config')
        .set(authHeader(admin.accessToken))
        .expect(403);

      expect(response.body.message).toBe('Instance administration is disabled');
    });
  });
});
