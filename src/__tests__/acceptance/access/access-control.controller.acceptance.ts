import {Client, expect} from '@loopback/testlab';
import {EquipmentAccessApplication} from '../../../application';
import {AccessSessionStatus, AccessType, ResourceLock} from '../../../models';
import {ResourceLockRepository} from '../../../repositories';
import {Security} from '../../../security';
import {LockService} from '../../../services';
import {givenEquipment} from '../../helper/data-helper';
import {givenPrincipal, TestPrincipal} from '../../helper/security-helper';
import {setupApplication} from '../../helper/test-helper';

describe('AccessControlController', () => {
  let app: EquipmentAccessApplication;
  let client: Client;
  let guard: TestPrincipal;
  let admin: TestPrincipal;

  before('setupApplication', async () => {
    ({app, client} = await setupApplication());
    guard = givenPrincipal(11, Security.Role.SECURITY);
    admin = givenPrincipal(12, Security.Role.ADMINISTRATOR);
  });

  after(async () => {
    await app.stop();
  });

  const enter = (principal: TestPrincipal, equipmentIdentifier: string) =>
    client
      .post('/access/entry')
      .set(principal.authHeaderName, principal.authHeaderValue)
      .send({equipmentIdentifier});

  it('rejects requests without a token', async () => {
    await client
      .post('/access/entry')
      .send({equipmentIdentifier: 'SN-000'})
      .expect(401);
    await client.get('/access/active').expect(401);
  });

  it('rejects requests with a token signed by someone else', async () => {
    await client
      .get('/access/active')
      .set(guard.authHeaderName, guard.wrongAuthHeaderValue)
      .expect(401);
  });

  it('answers 404 for unregistered equipment', async () => {
    const res = await enter(guard, 'SN-000').expect(404);
    expect(res.body.error.code).to.equal('NOT_FOUND');
  });

  it('validates the request body', async () => {
    await client
      .post('/access/entry')
      .set(guard.authHeaderName, guard.authHeaderValue)
      .send({notes: 'no identifier'})
      .expect(422);
  });

  it('registers entry and exit', async () => {
    const equipment = await givenEquipment(app);

    const entry = await client
      .post('/access/entry')
      .set(guard.authHeaderName, guard.authHeaderValue)
      .send({equipmentIdentifier: equipment.qrCode, notes: 'front gate'})
      .expect(201);

    expect(entry.body.equipmentId).to.equal(equipment.id);
    expect(entry.body.actorId).to.equal(guard.profile.id);
    expect(entry.body.status).to.equal(AccessSessionStatus.ACTIVE);
    expect(entry.body.accessType).to.equal(AccessType.ENTRY);
    expect(entry.body.notes).to.equal('front gate');
    expect(entry.body.audit.createdBy).to.equal(guard.profile.username);

    const conflict = await enter(guard, equipment.qrCode ?? '').expect(409);
    expect(conflict.body.error.code).to.equal('CONFLICT');
    expect(conflict.body.error.message).to.equal(
      `Equipment already inside since ${entry.body.entryAt}`,
    );

    const active = await client
      .get('/access/active')
      .set(guard.authHeaderName, guard.authHeaderValue)
      .expect(200);
    const item = active.body.find(
      (o: {sessionId: number}) => o.sessionId === entry.body.id,
    );
    expect(item).to.containEql({
      equipmentId: equipment.id,
      equipmentName: equipment.name,
      qrCode: equipment.qrCode,
      daysInside: 0,
      isExpired: false,
      status: AccessSessionStatus.ACTIVE,
    });

    const exit = await client
      .post('/access/exit')
      .set(guard.authHeaderName, guard.authHeaderValue)
      .send({equipmentIdentifier: equipment.serialNumber, notes: 'back gate'})
      .expect(200);

    expect(exit.body.id).to.equal(entry.body.id);
    expect(exit.body.status).to.equal(AccessSessionStatus.COMPLETED);
    expect(exit.body.notes).to.equal('front gate\nExit: back gate');

    const session = await client
      .get(`/access/sessions/${entry.body.id}`)
      .set(guard.authHeaderName, guard.authHeaderValue)
      .expect(200);
    expect(session.body.status).to.equal(AccessSessionStatus.COMPLETED);
    expect(session.body.audit.modifiedBy).to.equal(guard.profile.username);
  });

  it('tells a busy entry lock apart from equipment already inside', async () => {
    const equipment = await givenEquipment(app);
    const lockRepository = await app.getRepository(ResourceLockRepository);
    const held = await lockRepository.create(
      new ResourceLock({
        resourceCode: LockService.equipmentSessionResource(equipment.id ?? 0),
        ownerCode: 'other-request',
        expiresAt: new Date(Date.now() + 60000),
      }),
    );

    const busy = await enter(guard, equipment.qrCode ?? '').expect(409);
    expect(busy.body.error.code).to.equal('RESOURCE_BUSY');
    expect(busy.body.error.message).to.equal(
      `Equipment ${equipment.id} is being registered by another request, retry later`,
    );

    await lockRepository.deleteAll({id: held.id});
    await enter(guard, equipment.qrCode ?? '').expect(201);
  });

  it('answers 400 on exit of equipment that is not inside', async () => {
    const equipment = await givenEquipment(app);

    const res = await client
      .post('/access/exit')
      .set(guard.authHeaderName, guard.authHeaderValue)
      .send({equipmentIdentifier: equipment.qrCode})
      .expect(400);
    expect(res.body.error.code).to.equal('INVALID_STATE');
  });

  it('answers 404 on a missing session', async () => {
    const res = await client
      .get('/access/sessions/987654')
      .set(guard.authHeaderName, guard.authHeaderValue)
      .expect(404);
    expect(res.body.error.code).to.equal('NOT_FOUND');
    expect(res.body.error.message).to.equal('Access session 987654 not found');
  });

  describe('forced exit', () => {
    it('is forbidden to non administrators', async () => {
      const equipment = await givenEquipment(app);
      const entry = await enter(guard, equipment.qrCode ?? '').expect(201);

      const res = await client
        .post(`/access/sessions/${entry.body.id}/force-exit`)
        .set(guard.authHeaderName, guard.authHeaderValue)
        .send({reason: 'lost'})
        .expect(403);
      expect(res.body.error.code).to.equal('FORBIDDEN');
    });

    it('needs a reason', async () => {
      const equipment = await givenEquipment(app);
      const entry = await enter(guard, equipment.qrCode ?? '').expect(201);

      await client
        .post(`/access/sessions/${entry.body.id}/force-exit`)
        .set(admin.authHeaderName, admin.authHeaderValue)
        .send({reason: '  '})
        .expect(400);
    });

    it('closes the session for an administrator', async () => {
      const equipment = await givenEquipment(app);
      const entry = await enter(guard, equipment.qrCode ?? '').expect(201);

      const res = await client
        .post(`/access/sessions/${entry.body.id}/force-exit`)
        .set(admin.authHeaderName, admin.authHeaderValue)
        .send({reason: 'lost'})
        .expect(200);

      expect(res.body.status).to.equal(AccessSessionStatus.COMPLETED);
      expect(res.body.notes).to.equal(
        `Forced exit by ${admin.profile.fullName}: lost`,
      );
    });
  });

  describe('history', () => {
    it('pages the history of an equipment item', async () => {
      const equipment = await givenEquipment(app);
      for (let i = 0; i < 2; i++) {
        await enter(guard, equipment.qrCode ?? '').expect(201);
        await client
          .post('/access/exit')
          .set(guard.authHeaderName, guard.authHeaderValue)
          .send({equipmentIdentifier: equipment.qrCode})
          .expect(200);
      }

      const res = await client
        .get(`/access/equipment/${equipment.id}/history?skip=0&limit=1`)
        .set(guard.authHeaderName, guard.authHeaderValue)
        .expect(200);

      expect(res.body.totalElements).to.equal(2);
      expect(res.body.numberOfElements).to.equal(1);
      expect(res.body.skip).to.equal(0);
      expect(res.body.limit).to.equal(1);
      expect(res.body.hasNext).to.be.true();
      expect(res.body.content).to.have.length(1);
      expect(res.body.content[0].equipmentId).to.equal(equipment.id);
    });

    it('answers 404 for the history of unknown equipment', async () => {
      await client
        .get('/access/equipment/987654/history')
        .set(guard.authHeaderName, guard.authHeaderValue)
        .expect(404);
    });

    it('refuses a page larger than allowed', async () => {
      await client
        .get(`/access/actor/${guard.profile.id}/history?limit=501`)
        .set(guard.authHeaderName, guard.authHeaderValue)
        .expect(400);
    });

    it('lists the sessions of an actor', async () => {
      const other = givenPrincipal(31, Security.Role.IT);
      const equipment = await givenEquipment(app);
      const entry = await enter(other, equipment.qrCode ?? '').expect(201);

      const res = await client
        .get(`/access/actor/${other.profile.id}/history`)
        .set(guard.authHeaderName, guard.authHeaderValue)
        .expect(200);

      expect(res.body.totalElements).to.equal(1);
      expect(res.body.content[0].id).to.equal(entry.body.id);
    });

    it('refuses a reversed date range', async () => {
      const res = await client
        .get('/access/date-range')
        .query({
          startDate: '2026-02-01T00:00:00.000Z',
          endDate: '2026-01-01T00:00:00.000Z',
        })
        .set(guard.authHeaderName, guard.authHeaderValue)
        .expect(400);
      expect(res.body.error.message).to.equal(
        'Start date must be before end date',
      );
    });
  });

  it('lists overdue equipment', async () => {
    const res = await client
      .get('/access/expired')
      .set(guard.authHeaderName, guard.authHeaderValue)
      .expect(200);

    expect(res.body).to.be.Array();
  });
});
