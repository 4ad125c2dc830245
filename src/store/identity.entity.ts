import { Entity, Column, PrimaryGeneratedColumn } from 'typeorm';

@Entity({ name: 'identities' })
export class IdentityEntity {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column('text', { name: 'stable_key', unique: true })
  stableKey!: string;

  @Column('text', { nullable: true })
  login!: string | null;

  @Column('text', { nullable: true })
  name!: string | null;

  @Column('text', { nullable: true })
  email!: string | null;
}
