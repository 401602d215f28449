import { Column, Entity } from '../decorators';
import { ISO_TIMESTAMP_DEFAULT } from '../sqlite-dialect';
import { Grade } from './grade.entity';

@Entity('sections')
export class Section {
  @Column({ primary: true })
  id!: number;

  @Column({ name: 'section_name', nullable: false, unique: true })
  sectionName!: string;

  @Column({ name: 'grade_id', type: Number, references: () => Grade })
  gradeId?: number | null;

  @Column({ nullable: false, default: '1' })
  active!: boolean;

  /** Soft-delete flag. */
  @Column({ nullable: false, default: '0' })
  deleted!: boolean;

  @Column({ name: 'created_at', type: Date, nullable: false, default: ISO_TIMESTAMP_DEFAULT })
  createdAt!: Date;

  @Column({ name: 'updated_at', type: Date })
  updatedAt?: Date | null;

  constructor(init?: Partial<Section>) {
    Object.assign(this, init);
  }
}
