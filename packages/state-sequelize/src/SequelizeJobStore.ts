import type { Sequelize } from 'sequelize';
import type { ImportJob, JobStore } from '@product-importer/core';
import { defineImportJobModel } from './models/ImportJobModel.js';
import type { ImportJobModel } from './models/ImportJobModel.js';
import * as JobMapper from './mappers/JobMapper.js';

/**
 * Import job snapshots in the `import_jobs` table. Every save writes the
 * whole row in one statement.
 *
 * Call `initialize()` after construction to create the table.
 */
export class SequelizeJobStore implements JobStore {
  private readonly Job: ImportJobModel;

  constructor(sequelize: Sequelize) {
    this.Job = defineImportJobModel(sequelize);
  }

  async initialize(): Promise<void> {
    await this.Job.sync();
  }

  async create(job: ImportJob): Promise<void> {
    await this.Job.create(JobMapper.toRow(job));
  }

  async save(job: ImportJob): Promise<void> {
    await this.Job.upsert(JobMapper.toRow(job));
  }

  async get(jobId: string): Promise<ImportJob | null> {
    const row = await this.Job.findByPk(jobId);
    return row ? JobMapper.toDomain(row.get({ plain: true })) : null;
  }

  async list(limit: number): Promise<readonly ImportJob[]> {
    const rows = await this.Job.findAll({
      order: [
        ['createdAt', 'DESC'],
        ['id', 'DESC'],
      ],
      limit,
    });
    return rows.map((row) => JobMapper.toDomain(row.get({ plain: true })));
  }

  async delete(jobId: string): Promise<boolean> {
    const deleted = await this.Job.destroy({ where: { id: jobId } });
    return deleted > 0;
  }
}
