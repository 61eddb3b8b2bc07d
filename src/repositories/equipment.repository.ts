import {inject} from '@loopback/core';
import {DataObject, Options, Where} from '@loopback/repository';
import {DbDataSource} from '../datasources';
import {Equipment, EquipmentRelations} from '../models';
import {PaginationRepository} from './proto';

export class EquipmentRepository extends PaginationRepository<
  Equipment,
  typeof Equipment.prototype.id,
  EquipmentRelations
> {
  constructor(@inject('datasources.Db') dataSource: DbDataSource) {
    super(Equipment, dataSource);
  }

  public async findByQrCode(
    qrCode: string,
    options?: Options,
  ): Promise<Equipment | null> {
    return this.findOne({where: {qrCode}}, options);
  }

  public async findBySerialNumber(
    serialNumber: string,
    options?: Options,
  ): Promise<Equipment | null> {
    return this.findOne({where: {serialNumber}}, options);
  }

  public async compareAndSet(
    equipment: Equipment,
    changes: DataObject<Equipment>,
    modifiedBy: string,
    options?: Options,
  ): Promise<Equipment | null> {
    const where: Where<Equipment> = {
      id: equipment.id,
      version: equipment.version,
    };

    const result = await this.updateAll(
      {
        ...changes,
        version: equipment.version + 1,
        modifiedBy,
        modifiedAt: new Date(),
      },
      where,
      options,
    );

    if (result.count !== 1) {
      return null;
    }

    return this.findById(equipment.id, undefined, options);
  }
}
