import {Client, expect} from '@loopback/testlab';
import {EquipmentAccessApplication} from '../../../application';
import {
  AuditAction,
  EquipmentCategory,
  EquipmentType,
} from '../../../models';
import {AuditLogRepository} from '../../../repositories';
import {Security} from '../../../security';
import {ActorProfile, EquipmentRegistryService} from '../../../services';
import {givenEquipment, randomCode} from '../../helper/data-helper';
import {
  givenActor,
  givenPrincipal,
  TestPrincipal,
} from '../../helper/security-helper';
import {
  getEquipmentRegistryService,
  setupApplication,
} from '../../helper/test-helper';

describe('Equipment registry', () => {
  let app: EquipmentAccessApplication;
  let client: Client;
  let registry: EquipmentRegistryService;
  let technician: ActorProfile;

  before('setupApplication', async () => {
    ({app, client} = await setupApplication());
    registry = await getEquipmentRegistryService(app);
    technician = givenActor(3, Security.Role.IT);
  });

  after(async () => {
    await app.stop();
  });

  describe('service', () => {
    it('generates a QR code for frequent equipment', async () => {
      const serialNumber = randomCode('SN');

      const created = await registry.create(
        {
          name: ' Laptop ',
          type: EquipmentType.FREQUENT,
          category: EquipmentCategory.TECHNOLOGICAL,
          serialNumber,
        },
        technician,
      );

      expect(created.name).to.equal('Laptop');
      expect(created.qrCode).to.match(/^EQ-[0-9A-F]{12}$/);
      expect(created.serialNumber).to.equal(serialNumber);
      expect(created.active).to.be.true();
      expect(created.version).to.equal(1);
      expect(created.createdBy).to.equal(technician.username);

      const auditLogRepository = await app.getRepository(AuditLogRepository);
      const events = await auditLogRepository.find({
        where: {action: AuditAction.EQUIPMENT_CREATED, entityId: created.id},
      });
      expect(events).to.have.length(1);
      expect(events[0].actorId).to.equal(technician.id);

      const resolved = await registry.resolveOrNotFound(created.qrCode ?? '');
      expect(resolved.id).to.equal(created.id);
    });

    it('leaves non frequent equipment without a QR code', async () => {
      const created = await registry.create(
        {
          name: 'Projector',
          type: EquipmentType.NON_FREQUENT,
          category: EquipmentCategory.TECHNOLOGICAL,
          serialNumber: randomCode('SN'),
        },
        technician,
      );

      expect(created.qrCode ?? null).to.be.null();
    });

    it('refuses a QR code on non frequent equipment', async () => {
      await expect(
        registry.create(
          {
            name: 'Projector',
            type: EquipmentType.NON_FREQUENT,
            category: EquipmentCategory.TECHNOLOGICAL,
            qrCode: randomCode('QR'),
          },
          technician,
        ),
      ).to.be.rejectedWith({
        statusCode: 400,
        message: 'A QR code can only be assigned to FREQUENT equipment',
      });
    });

    it('requires an image for biomedical equipment', async () => {
      await expect(
        registry.create(
          {
            name: 'Infusion pump',
            type: EquipmentType.NON_FREQUENT,
            category: EquipmentCategory.BIOMEDICAL,
            serialNumber: randomCode('SN'),
            imageUrl: ' ',
          },
          technician,
        ),
      ).to.be.rejectedWith({
        statusCode: 400,
        message: 'Biomedical equipment requires an image',
      });
    });

    it('refuses duplicate identifiers', async () => {
      const existing = await givenEquipment(app);

      await expect(
        registry.create(
          {
            name: 'Copy',
            type: EquipmentType.NON_FREQUENT,
            category: EquipmentCategory.TECHNOLOGICAL,
            serialNumber: existing.serialNumber,
          },
          technician,
        ),
      ).to.be.rejectedWith({
        statusCode: 409,
        code: 'CONFLICT',
        message: `Serial number already registered: ${existing.serialNumber}`,
      });

      await expect(
        registry.create(
          {
            name: 'Copy',
            type: EquipmentType.FREQUENT,
            category: EquipmentCategory.TECHNOLOGICAL,
            qrCode: existing.qrCode,
          },
          technician,
        ),
      ).to.be.rejectedWith({
        statusCode: 409,
        message: `QR code already registered: ${existing.qrCode}`,
      });
    });

    it('deactivates equipment', async () => {
      const equipment = await givenEquipment(app);

      const updated = await registry.setActive(
        equipment.id ?? 0,
        false,
        technician,
      );

      expect(updated.active).to.be.false();
      expect(updated.version).to.equal(2);
      expect(updated.modifiedBy).to.equal(technician.username);

      const unchanged = await registry.setActive(
        equipment.id ?? 0,
        false,
        technician,
      );
      expect(unchanged.version).to.equal(2);
    });

    it('renames equipment and clears its description', async () => {
      const equipment = await givenEquipment(app, {description: 'old desk'});

      const renamed = await registry.update(
        equipment.id ?? 0,
        {name: '  Renamed  '},
        technician,
      );
      expect(renamed.name).to.equal('Renamed');
      expect(renamed.description).to.equal('old desk');
      expect(renamed.version).to.equal(2);

      const cleared = await registry.update(
        equipment.id ?? 0,
        {description: '   '},
        technician,
      );
      expect(cleared.description ?? null).to.be.null();
      expect(cleared.version).to.equal(3);

      const unchanged = await registry.update(
        equipment.id ?? 0,
        {name: 'Renamed'},
        technician,
      );
      expect(unchanged.version).to.equal(3);

      const auditLogRepository = await app.getRepository(AuditLogRepository);
      const events = await auditLogRepository.find({
        where: {
          action: AuditAction.EQUIPMENT_UPDATED,
          entityId: equipment.id,
        },
        order: ['id ASC'],
      });
      expect(events.map(o => o.details)).to.eql([
        {name: 'Renamed'},
        {description: null},
      ]);
    });

    it('refuses a blank name on update', async () => {
      const equipment = await givenEquipment(app);

      await expect(
        registry.update(equipment.id ?? 0, {name: ' '}, technician),
      ).to.be.rejectedWith({
        statusCode: 400,
        message: 'Equipment name cannot be blank',
      });
    });

    it('fails on blank identifiers', async () => {
      await expect(registry.resolveOrNotFound('  ')).to.be.rejectedWith({
        statusCode: 400,
      });
    });
  });

  describe('controller', () => {
    let itPrincipal: TestPrincipal;
    let guardPrincipal: TestPrincipal;

    before(() => {
      itPrincipal = givenPrincipal(21, Security.Role.IT);
      guardPrincipal = givenPrincipal(22, Security.Role.SECURITY);
    });

    it('registers equipment for IT staff', async () => {
      const serialNumber = randomCode('SN');

      const res = await client
        .post('/equipment')
        .set(itPrincipal.authHeaderName, itPrincipal.authHeaderValue)
        .send({
          name: 'Monitor',
          type: EquipmentType.FREQUENT,
          category: EquipmentCategory.TECHNOLOGICAL,
          serialNumber,
        })
        .expect(201);

      expect(res.body.serialNumber).to.equal(serialNumber);
      expect(res.body.active).to.be.true();
      expect(res.body.audit.createdBy).to.equal(itPrincipal.profile.username);

      const fetched = await client
        .get(`/equipment/${res.body.id}`)
        .set(guardPrincipal.authHeaderName, guardPrincipal.authHeaderValue)
        .expect(200);
      expect(fetched.body.qrCode).to.equal(res.body.qrCode);
    });

    it('forbids registration to security staff', async () => {
      await client
        .post('/equipment')
        .set(guardPrincipal.authHeaderName, guardPrincipal.authHeaderValue)
        .send({
          name: 'Monitor',
          type: EquipmentType.FREQUENT,
          category: EquipmentCategory.TECHNOLOGICAL,
        })
        .expect(403);
    });

    it('filters the equipment list', async () => {
      await givenEquipment(app, {type: EquipmentType.NON_FREQUENT});

      const res = await client
        .get('/equipment?type=NON_FREQUENT&limit=50')
        .set(guardPrincipal.authHeaderName, guardPrincipal.authHeaderValue)
        .expect(200);

      expect(res.body.content.length).to.be.above(0);
      for (const item of res.body.content) {
        expect(item.type).to.equal(EquipmentType.NON_FREQUENT);
      }

      await client
        .get('/equipment?type=SOMETIMES')
        .set(guardPrincipal.authHeaderName, guardPrincipal.authHeaderValue)
        .expect(400);
    });

    it('deactivates equipment, which then cannot enter', async () => {
      const equipment = await givenEquipment(app);

      const res = await client
        .patch(`/equipment/${equipment.id}/active`)
        .set(itPrincipal.authHeaderName, itPrincipal.authHeaderValue)
        .send({active: false})
        .expect(200);
      expect(res.body.active).to.be.false();

      const entry = await client
        .post('/access/entry')
        .set(guardPrincipal.authHeaderName, guardPrincipal.authHeaderValue)
        .send({equipmentIdentifier: equipment.qrCode})
        .expect(400);
      expect(entry.body.error.code).to.equal('INVALID_STATE');
    });

    it('answers 404 for unknown equipment', async () => {
      await client
        .get('/equipment/987654')
        .set(guardPrincipal.authHeaderName, guardPrincipal.authHeaderValue)
        .expect(404);
    });

    it('looks equipment up by QR code and by serial number', async () => {
      const equipment = await givenEquipment(app);

      const byQr = await client
        .get(`/equipment/by-qr/${equipment.qrCode}`)
        .set(guardPrincipal.authHeaderName, guardPrincipal.authHeaderValue)
        .expect(200);
      expect(byQr.body.id).to.equal(equipment.id);

      const bySerial = await client
        .get(`/equipment/by-serial/${equipment.serialNumber}`)
        .set(guardPrincipal.authHeaderName, guardPrincipal.authHeaderValue)
        .expect(200);
      expect(bySerial.body.id).to.equal(equipment.id);

      // a serial number is not a QR code
      const missing = await client
        .get(`/equipment/by-qr/${equipment.serialNumber}`)
        .set(guardPrincipal.authHeaderName, guardPrincipal.authHeaderValue)
        .expect(404);
      expect(missing.body.error.code).to.equal('NOT_FOUND');
      expect(missing.body.error.message).to.equal(
        `Equipment not found for QR code: ${equipment.serialNumber}`,
      );
    });

    it('updates equipment for IT staff only', async () => {
      const equipment = await givenEquipment(app);

      const res = await client
        .patch(`/equipment/${equipment.id}`)
        .set(itPrincipal.authHeaderName, itPrincipal.authHeaderValue)
        .send({name: 'Projector', description: 'meeting room'})
        .expect(200);
      expect(res.body.name).to.equal('Projector');
      expect(res.body.description).to.equal('meeting room');
      expect(res.body.audit.modifiedBy).to.equal(itPrincipal.profile.username);

      const forbidden = await client
        .patch(`/equipment/${equipment.id}`)
        .set(guardPrincipal.authHeaderName, guardPrincipal.authHeaderValue)
        .send({name: 'Other'})
        .expect(403);
      expect(forbidden.body.error.code).to.equal('FORBIDDEN');
    });
  });
});
