import type { EntityManager } from '../entity-manager';
import { Repository, RepositoryOptions } from '../repository';
import { defineQuery } from '../query';
import { Grade } from './grade.entity';
import { GradeSectionCount } from './dto';

const searchByName = defineQuery({
  name: 'GradeRepository.searchByName',
  sql: `
    SELECT * FROM grades
    WHERE grade_name LIKE :pattern
    ORDER BY id
  `,
  params: ['pattern'],
  model: Grade,
});

const countSectionsPerGrade = defineQuery({
  name: 'GradeRepository.countSectionsPerGrade',
  sql: `
    SELECT g.id AS grade_id, g.grade_name AS grade_name, COUNT(s.id) AS section_count
    FROM grades g
    LEFT JOIN sections s ON s.grade_id = g.id AND s.deleted = 0
    GROUP BY g.id, g.grade_name
    ORDER BY g.id
  `,
  model: GradeSectionCount,
});

export class GradeRepository extends Repository<Grade> {
  constructor(manager: EntityManager, options?: RepositoryOptions) {
    super(Grade, manager, options);
  }

  /**
   * Grades whose name matches a LIKE pattern, e.g. `1%`.
   */
  searchByName(pattern: string): Promise<Grade[]> {
    return this.run('searchByName', true, async () => {
      await this.manager.flush();
      return searchByName(this.manager, { pattern });
    });
  }

  countSectionsPerGrade(): Promise<GradeSectionCount[]> {
    return this.run('countSectionsPerGrade', true, async () => {
      await this.manager.flush();
      return countSectionsPerGrade(this.manager, {});
    });
  }
}
