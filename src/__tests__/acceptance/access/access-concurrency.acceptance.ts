import {expect} from '@loopback/testlab';
import {EquipmentAccessApplication} from '../../../application';
import {AccessSessionStatus, AuditAction} from '../../../models';
import {
  AccessSessionRepository,
  AuditLogRepository,
} from '../../../repositories';
import {Security} from '../../../security';
import {AccessSessionService, ActorProfile} from '../../../services';
import {givenEquipment} from '../../helper/data-helper';
import {givenActor} from '../../helper/security-helper';
import {
  getAccessSessionService,
  setupApplication,
} from '../../helper/test-helper';

function rejectionsOf<T>(results: PromiseSettledResult<T>[]): unknown[] {
  return results
    .filter((o): o is PromiseRejectedResult => o.status === 'rejected')
    .map(o => o.reason);
}

describe('Concurrent access operations', () => {
  let app: EquipmentAccessApplication;
  let service: AccessSessionService;
  let accessSessionRepository: AccessSessionRepository;
  let auditLogRepository: AuditLogRepository;
  let first: ActorProfile;
  let second: ActorProfile;

  before('setupApplication', async () => {
    ({app} = await setupApplication());
    service = await getAccessSessionService(app);
    accessSessionRepository = await app.getRepository(AccessSessionRepository);
    auditLogRepository = await app.getRepository(AuditLogRepository);
    first = givenActor(1, Security.Role.SECURITY);
    second = givenActor(2, Security.Role.SECURITY);
  });

  after(async () => {
    await app.stop();
  });

  it('lets only one of two simultaneous entries through', async () => {
    const equipment = await givenEquipment(app);
    const code = equipment.qrCode ?? '';

    const results = await Promise.allSettled([
      service.registerEntry(code, first),
      service.registerEntry(code, second),
    ]);

    const fulfilled = results.filter(o => o.status === 'fulfilled');
    const rejected = rejectionsOf(results);
    expect(fulfilled).to.have.length(1);
    expect(rejected).to.have.length(1);
    expect(rejected[0]).to.match({statusCode: 409, code: 'CONFLICT'});

    const active = await accessSessionRepository.find({
      where: {equipmentId: equipment.id, status: AccessSessionStatus.ACTIVE},
    });
    expect(active).to.have.length(1);
  });

  it('serializes entries across many items', async () => {
    const items = await Promise.all([
      givenEquipment(app),
      givenEquipment(app),
      givenEquipment(app),
    ]);

    const results = await Promise.allSettled(
      items.flatMap(item => [
        service.registerEntry(item.qrCode ?? '', first),
        service.registerEntry(item.serialNumber ?? '', second),
      ]),
    );

    expect(results.filter(o => o.status === 'fulfilled')).to.have.length(3);
    for (const item of items) {
      const active = await accessSessionRepository.find({
        where: {equipmentId: item.id, status: AccessSessionStatus.ACTIVE},
      });
      expect(active).to.have.length(1);
    }
  });

  it('lets only one of two simultaneous exits through', async () => {
    const equipment = await givenEquipment(app);
    const code = equipment.qrCode ?? '';
    const session = await service.registerEntry(code, first);

    const results = await Promise.allSettled([
      service.registerExit(code, first),
      service.registerExit(code, second),
    ]);

    expect(results.filter(o => o.status === 'fulfilled')).to.have.length(1);
    const rejected = rejectionsOf(results);
    expect(rejected).to.have.length(1);
    expect(rejected[0]).to.have.property('statusCode').which.is.oneOf(400, 409);

    const stored = await accessSessionRepository.findById(session.id);
    expect(stored.status).to.equal(AccessSessionStatus.COMPLETED);
    expect(stored.version).to.equal(2);

    const events = await auditLogRepository.find({
      where: {action: AuditAction.ACCESS_EXIT, entityId: session.id},
    });
    expect(events).to.have.length(1);
  });

  it('refuses a write based on a stale version', async () => {
    const equipment = await givenEquipment(app);
    const session = await service.registerEntry(equipment.qrCode ?? '', first);
    await service.registerExit(equipment.qrCode ?? '', first);

    const result = await accessSessionRepository.compareAndSet(
      session,
      {status: AccessSessionStatus.BLOCKED},
      second.username,
    );

    expect(result).to.be.null();
    const stored = await accessSessionRepository.findById(session.id);
    expect(stored.status).to.equal(AccessSessionStatus.COMPLETED);
    expect(stored.version).to.equal(2);
  });

  it('expires a session only once under concurrent scans', async () => {
    const equipment = await givenEquipment(app);
    const session = await service.registerEntry(
      equipment.qrCode ?? '',
      first,
      undefined,
      {maxStayDays: 1},
    );
    const at = new Date(session.expectedExitAt.getTime() + 1000);

    const [a, b] = await Promise.all([
      service.scanExpired(at),
      service.scanExpired(at),
    ]);

    expect(a.find(o => o.id === session.id)?.status).to.equal(
      AccessSessionStatus.EXPIRED,
    );
    expect(b.find(o => o.id === session.id)?.status).to.equal(
      AccessSessionStatus.EXPIRED,
    );

    const stored = await accessSessionRepository.findById(session.id);
    expect(stored.version).to.equal(2);
    const events = await auditLogRepository.find({
      where: {action: AuditAction.ACCESS_EXPIRED, entityId: session.id},
    });
    expect(events).to.have.length(1);
  });
});
