import { MigrationInterface, QueryRunner, Table } from "typeorm";

export class CreateStaffTable1700000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    const driver = queryRunner.connection.driver;
    const amount = (name: string) => ({ name, type: "double precision", isNullable: false });

    // ifNotExist: a register created before migrations were tracked is left as it is
    await queryRunner.createTable(
      new Table({
        name: "staff",
        columns: [
          { name: "id", type: "integer", isPrimary: true, isGenerated: true, generationStrategy: "increment" },
          { name: "name", type: "varchar", isNullable: false },
          { name: "role", type: "varchar", isNullable: false },
          amount("basic"),
          amount("housing"),
          amount("transport"),
          amount("feeding"),
          {
            name: "created_at",
            type: driver.normalizeType({ type: driver.mappedDataTypes.createDate }),
            default: driver.mappedDataTypes.createDateDefault,
            isNullable: false,
          },
        ],
      }),
      true
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS staff;`);
  }
}
