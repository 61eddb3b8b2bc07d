import {Client, expect} from '@loopback/testlab';
import {EquipmentAccessApplication} from '../../../application';
import {AuditAction, AuditEntityType} from '../../../models';
import {Security} from '../../../security';
import {AuditService} from '../../../services';
import {givenEquipment} from '../../helper/data-helper';
import {givenActor, givenPrincipal} from '../../helper/security-helper';
import {getAuditService, setupApplication} from '../../helper/test-helper';

describe('Audit log', () => {
  let app: EquipmentAccessApplication;
  let client: Client;
  let auditService: AuditService;

  before('setupApplication', async () => {
    ({app, client} = await setupApplication());
    auditService = await getAuditService(app);
  });

  after(async () => {
    await app.stop();
  });

  it('records and lists events by actor and action', async () => {
    const actor = givenActor(41, Security.Role.IT);

    const recorded = await auditService.record(
      AuditAction.EQUIPMENT_UPDATED,
      AuditEntityType.EQUIPMENT,
      123,
      actor,
      {active: false},
    );
    expect(recorded?.actorId).to.equal(actor.id);

    const byActor = await auditService.listByActor(actor.id, {});
    expect(byActor.totalElements).to.equal(1);
    expect(byActor.content[0]).to.containEql({
      action: AuditAction.EQUIPMENT_UPDATED,
      entityType: AuditEntityType.EQUIPMENT,
      entityId: 123,
      details: {active: false},
    });

    const byAction = await auditService.listByAction(
      AuditAction.EQUIPMENT_UPDATED,
      {},
    );
    expect(byAction.content.map(o => o.id)).to.containEql(recorded?.id);
  });

  it('lists events over a period, newest first', async () => {
    const actor = givenActor(44, Security.Role.ADMINISTRATOR);
    const start = new Date();
    const first = await auditService.record(
      AuditAction.REPORT_GENERATED,
      AuditEntityType.REPORT,
      undefined,
      actor,
    );
    const second = await auditService.record(
      AuditAction.REPORT_GENERATED,
      AuditEntityType.REPORT,
      undefined,
      actor,
    );
    const end = new Date();

    const page = await auditService.listByDateRange(start, end, {limit: 500});
    const ids = page.content.map(o => o.id);
    expect(ids).to.containEql(first?.id);
    expect(ids).to.containEql(second?.id);
    expect(ids.indexOf(second?.id)).to.be.below(ids.indexOf(first?.id));

    await expect(
      auditService.listByDateRange(end, new Date(start.getTime() - 1), {}),
    ).to.be.rejectedWith({statusCode: 400});

    const all = await auditService.listAll({skip: 0, limit: 1});
    expect(all.numberOfElements).to.equal(1);
    expect(all.totalElements).to.be.aboveOrEqual(2);
  });

  it('exposes the log to administrators only', async () => {
    const guard = givenPrincipal(42, Security.Role.SECURITY);
    const admin = givenPrincipal(43, Security.Role.ADMINISTRATOR);
    const equipment = await givenEquipment(app);

    await client
      .post('/access/entry')
      .set(guard.authHeaderName, guard.authHeaderValue)
      .set('User-Agent', 'gate-terminal')
      .send({equipmentIdentifier: equipment.qrCode})
      .expect(201);

    await client
      .get('/audit-logs')
      .set(guard.authHeaderName, guard.authHeaderValue)
      .expect(403);

    const res = await client
      .get(`/audit-logs?action=ACCESS_ENTRY&actorId=${guard.profile.id}`)
      .set(admin.authHeaderName, admin.authHeaderValue)
      .expect(200);

    expect(res.body.totalElements).to.equal(1);
    expect(res.body.content[0].action).to.equal(AuditAction.ACCESS_ENTRY);
    expect(res.body.content[0].details.equipmentId).to.equal(equipment.id);
    expect(res.body.content[0].userAgent).to.equal('gate-terminal');

    await client
      .get('/audit-logs?action=NOTHING')
      .set(admin.authHeaderName, admin.authHeaderValue)
      .expect(400);
  });
});
