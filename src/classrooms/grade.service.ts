import type { Page, WhereConditions } from '../types';
import { ConflictError, NotFoundError } from '../errors';
import { Grade } from './grade.entity';
import { GradeRepository } from './grade.repository';
import {
  GradePageSearch,
  GradeRequest,
  GradeResponse,
  MessageResponse,
  toGradeResponse,
  toPageResponse,
} from './dto';
import { ServiceOptions, dateRange, requireName, rootTransaction } from './service-support';

export class GradeService {
  constructor(
    private readonly grades: GradeRepository,
    private readonly options: ServiceOptions = {},
  ) {}

  /**
   * @throws ConflictError when a grade with the same name exists. Nothing is written.
   */
  create(request: GradeRequest): Promise<GradeResponse> {
    return this.transaction('create', true, async () => {
      const gradeName = requireName(request.gradeName, 'gradeName');
      await this.ensureNameFree(gradeName);
      const grade = await this.grades.save(new Grade({ gradeName }));
      return toGradeResponse(grade);
    });
  }

  getAll(): Promise<GradeResponse[]> {
    return this.transaction('getAll', false, async () => {
      const grades = await this.grades.getAll();
      return grades.map(toGradeResponse);
    });
  }

  getById(id: number): Promise<GradeResponse> {
    return this.transaction('getById', false, async () => toGradeResponse(await this.require(id)));
  }

  update(id: number, request: GradeRequest): Promise<GradeResponse> {
    return this.transaction('update', true, async () => {
      const gradeName = requireName(request.gradeName, 'gradeName');
      const grade = await this.require(id);
      if (grade.gradeName !== gradeName) {
        await this.ensureNameFree(gradeName);
      }
      const updated = await this.grades.updateById(id, { gradeName, updatedAt: new Date() });
      return toGradeResponse(updated ?? grade);
    });
  }

  delete(id: number): Promise<MessageResponse> {
    return this.transaction('delete', true, async () => {
      await this.require(id);
      await this.grades.delete(id);
      return {
        statusCode: 200,
        success: true,
        message: 'Grade deleted successfully.',
        details: `Grade with ID '${id}' has been deleted.`,
      };
    });
  }

  getPage(page: number, size: number): Promise<Page<GradeResponse>> {
    return this.transaction('getPage', false, async () =>
      toPageResponse(await this.grades.getPageable(page, size), toGradeResponse),
    );
  }

  /**
   * Page of grades filtered by exact name and creation time bounds (inclusive).
   */
  findPage(search: GradePageSearch): Promise<Page<GradeResponse>> {
    return this.transaction('findPage', false, async () => {
      const where: WhereConditions = {};
      const createdAt = dateRange(search.createdFrom, search.createdTo);
      if (createdAt) where.createdAt = createdAt;

      const page = await this.grades.findPageables({
        page: search.page,
        size: search.size,
        filters: search.gradeName ? { gradeName: search.gradeName } : {},
        where,
      });
      return toPageResponse(page, toGradeResponse);
    });
  }

  private async require(id: number): Promise<Grade> {
    const grade = await this.grades.getById(id);
    if (!grade) {
      throw new NotFoundError('Grade not found.', { details: `Grade with ID '${id}' does not exist.` });
    }
    return grade;
  }

  private async ensureNameFree(gradeName: string): Promise<void> {
    if (await this.grades.existsBy({ gradeName })) {
      throw new ConflictError('Grade with this name already exists.', {
        details: `A grade with name '${gradeName}' already exists.`,
      });
    }
  }

  private transaction<R>(method: string, write: boolean, operation: () => Promise<R>): Promise<R> {
    return rootTransaction(this.grades, `GradeService.${method}`, this.options, write, operation);
  }
}
