import type { EntityManager } from '../entity-manager';
import { Repository, RepositoryOptions } from '../repository';
import { Section } from './section.entity';

export class SectionRepository extends Repository<Section> {
  constructor(manager: EntityManager, options?: RepositoryOptions) {
    super(Section, manager, options);
  }

  /** Sections of one grade that are not soft-deleted. */
  findByGrade(gradeId: number): Promise<Section[]> {
    return this.run('findByGrade', true, () => this.selectAll(this.query({ gradeId, deleted: false })));
  }
}
