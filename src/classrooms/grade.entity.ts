import { Column, Entity } from '../decorators';
import { ISO_TIMESTAMP_DEFAULT } from '../sqlite-dialect';

@Entity('grades')
export class Grade {
  @Column({ primary: true })
  id!: number;

  @Column({ name: 'grade_name', nullable: false, unique: true })
  gradeName!: string;

  /** Set by the store on insert. */
  @Column({ name: 'created_at', type: Date, nullable: false, default: ISO_TIMESTAMP_DEFAULT })
  createdAt!: Date;

  @Column({ name: 'updated_at', type: Date })
  updatedAt?: Date | null;

  constructor(init?: Partial<Grade>) {
    Object.assign(this, init);
  }
}
