import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';

@Entity('staff')
export class Staff {
  @PrimaryGeneratedColumn({ name: 'id' })
  id!: number;

  @Column({ name: 'name', type: 'varchar' })
  name!: string;

  @Column({ name: 'role', type: 'varchar' })
  role!: string;

  @Column({ name: 'basic', type: 'double precision' })
  basic!: number;

  @Column({ name: 'housing', type: 'double precision' })
  housing!: number;

  @Column({ name: 'transport', type: 'double precision' })
  transport!: number;

  @Column({ name: 'feeding', type: 'double precision' })
  feeding!: number;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
