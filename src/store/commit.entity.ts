import { Entity, Column, PrimaryGeneratedColumn, ManyToOne, JoinColumn, Index } from 'typeorm';
import { IdentityEntity } from './identity.entity.js';

@Entity({ name: 'commits' })
export class CommitEntity {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column('text', { unique: true })
  sha!: string;

  @Index('ix_commits_author')
  @Column('integer', { name: 'author_id' })
  authorId!: number;

  @Index('ix_commits_committer')
  @Column('integer', { name: 'committer_id' })
  committerId!: number;

  @ManyToOne(() => IdentityEntity)
  @JoinColumn({ name: 'author_id' })
  author?: IdentityEntity;

  @ManyToOne(() => IdentityEntity)
  @JoinColumn({ name: 'committer_id' })
  committer?: IdentityEntity;

  @Index('ix_commits_authored_at')
  @Column('timestamptz', { name: 'authored_at' })
  authoredAt!: Date;

  @Column('timestamptz', { name: 'committed_at' })
  committedAt!: Date;

  @Column('text', { nullable: true })
  message!: string | null;
}
