import type { Page, WhereConditions } from '../types';
import { ConflictError, NotFoundError } from '../errors';
import { Section } from './section.entity';
import { SectionRepository } from './section.repository';
import { GradeRepository } from './grade.repository';
import {
  MessageResponse,
  SectionPageSearch,
  SectionRequest,
  SectionResponse,
  toPageResponse,
  toSectionResponse,
} from './dto';
import { ServiceOptions, dateRange, requireName, rootTransaction } from './service-support';

const SECTION_NAME_MAX_LENGTH = 10;

/**
 * Sections are soft-deleted: a deleted section keeps its row (and its name)
 * but is no longer listed or returned.
 */
export class SectionService {
  constructor(
    private readonly sections: SectionRepository,
    private readonly grades: GradeRepository,
    private readonly options: ServiceOptions = {},
  ) {}

  create(request: SectionRequest): Promise<SectionResponse> {
    return this.transaction('create', true, async () => {
      const sectionName = requireName(request.sectionName, 'sectionName', SECTION_NAME_MAX_LENGTH);
      await this.ensureNameFree(sectionName);
      const gradeId = request.gradeId ?? null;
      if (gradeId !== null) await this.ensureGradeExists(gradeId);

      const section = await this.sections.save(new Section({ sectionName, gradeId }));
      return toSectionResponse(section);
    });
  }

  getAll(): Promise<SectionResponse[]> {
    return this.transaction('getAll', false, async () => {
      const sections = await this.sections.findAllBy({ deleted: false });
      return sections.map(toSectionResponse);
    });
  }

  getById(id: number): Promise<SectionResponse> {
    return this.transaction('getById', false, async () => toSectionResponse(await this.require(id)));
  }

  update(id: number, request: SectionRequest): Promise<SectionResponse> {
    return this.transaction('update', true, async () => {
      const sectionName = requireName(request.sectionName, 'sectionName', SECTION_NAME_MAX_LENGTH);
      const section = await this.require(id);
      if (section.sectionName !== sectionName) {
        await this.ensureNameFree(sectionName);
      }

      const changes: Partial<Section> = { sectionName, updatedAt: new Date() };
      if (request.gradeId !== undefined) {
        if (request.gradeId !== null) await this.ensureGradeExists(request.gradeId);
        changes.gradeId = request.gradeId;
      }
      const updated = await this.sections.updateById(id, changes);
      return toSectionResponse(updated ?? section);
    });
  }

  delete(id: number): Promise<MessageResponse> {
    return this.transaction('delete', true, async () => {
      await this.require(id);
      await this.sections.softDeleteById(id);
      return {
        statusCode: 200,
        success: true,
        message: 'Section deleted successfully.',
        details: `Section with ID '${id}' has been deleted.`,
      };
    });
  }

  restore(id: number): Promise<SectionResponse> {
    return this.transaction('restore', true, async () => {
      if (!(await this.sections.restoreById(id))) {
        throw new NotFoundError('Section not found.', { details: `Section with ID '${id}' does not exist.` });
      }
      return toSectionResponse(await this.require(id));
    });
  }

  getPage(page: number, size: number): Promise<Page<SectionResponse>> {
    return this.transaction('getPage', false, async () =>
      toPageResponse(await this.sections.getPageableBy(page, size, { deleted: false }), toSectionResponse),
    );
  }

  /**
   * Page of sections filtered by exact name, grade, and creation / update time bounds (inclusive).
   */
  findPage(search: SectionPageSearch): Promise<Page<SectionResponse>> {
    return this.transaction('findPage', false, async () => {
      const filters: Partial<Section> = { deleted: false };
      if (search.sectionName) filters.sectionName = search.sectionName;
      if (search.gradeId !== undefined) filters.gradeId = search.gradeId;

      const where: WhereConditions = {};
      const createdAt = dateRange(search.createdFrom, search.createdTo);
      if (createdAt) where.createdAt = createdAt;
      const updatedAt = dateRange(search.updatedFrom, search.updatedTo);
      if (updatedAt) where.updatedAt = updatedAt;

      const page = await this.sections.findPageables({ page: search.page, size: search.size, filters, where });
      return toPageResponse(page, toSectionResponse);
    });
  }

  private async require(id: number): Promise<Section> {
    const section = await this.sections.getById(id);
    if (!section || section.deleted) {
      throw new NotFoundError('Section not found.', { details: `Section with ID '${id}' does not exist.` });
    }
    return section;
  }

  private async ensureNameFree(sectionName: string): Promise<void> {
    if (await this.sections.existsBy({ sectionName })) {
      throw new ConflictError('Section with this name already exists.', {
        details: `A section with name '${sectionName}' already exists.`,
      });
    }
  }

  private async ensureGradeExists(gradeId: number): Promise<void> {
    if (!(await this.grades.existsById(gradeId))) {
      throw new NotFoundError('Grade not found.', { details: `Grade with ID '${gradeId}' does not exist.` });
    }
  }

  private transaction<R>(method: string, write: boolean, operation: () => Promise<R>): Promise<R> {
    return rootTransaction(this.sections, `SectionService.${method}`, this.options, write, operation);
  }
}
