import Database from 'better-sqlite3';
import { z } from 'zod';
import type {
    AnalysisStats,
    AnalyzedPaper,
    Dataset,
    DatasetUpdate,
    NewDataset,
    NewProject,
    NewUser,
    Paper,
    PaperAnalysis,
    PaperSource,
    Project,
    ProjectUpdate,
    ProjectWithMembers,
    User,
} from '../types/index.js';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 * Users, projects and their membership, datasets, and stored paper analyses.
 */
const MIGRATION_V1 = `
CREATE TABLE IF NOT EXISTS users (
  user_id INTEGER PRIMARY KEY,
  username TEXT NOT NULL UNIQUE CHECK (length(username) BETWEEN 1 AND 50),
  email TEXT NOT NULL UNIQUE CHECK (length(email) BETWEEN 3 AND 120),
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

CREATE TABLE IF NOT EXISTS projects (
  project_id INTEGER PRIMARY KEY,
  name TEXT NOT NULL CHECK (length(name) BETWEEN 1 AND 100),
  description TEXT,
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
  updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

-- Project membership (many-to-many)
CREATE TABLE IF NOT EXISTS project_users (
  project_id INTEGER NOT NULL REFERENCES projects(project_id) ON DELETE CASCADE,
  user_id INTEGER NOT NULL REFERENCES users(user_id) ON DELETE CASCADE,
  PRIMARY KEY (project_id, user_id)
);

CREATE TABLE IF NOT EXISTS datasets (
  dataset_id INTEGER PRIMARY KEY,
  name TEXT NOT NULL CHECK (length(name) BETWEEN 1 AND 100),
  description TEXT,
  file_path TEXT CHECK (file_path IS NULL OR length(file_path) <= 255),
  owner_id INTEGER REFERENCES users(user_id) ON DELETE SET NULL,
  project_id INTEGER NOT NULL REFERENCES projects(project_id) ON DELETE CASCADE,
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
  updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

-- Analyzed papers: a snapshot of the paper plus the LLM analysis
CREATE TABLE IF NOT EXISTS analyzed_papers (
  analysis_id INTEGER PRIMARY KEY,
  source_id TEXT NOT NULL UNIQUE,
  source TEXT NOT NULL,
  title TEXT NOT NULL,
  abstract TEXT,
  authors_json TEXT NOT NULL DEFAULT '[]',
  year INTEGER,
  venue TEXT,
  url TEXT,
  citations INTEGER NOT NULL DEFAULT 0,
  doi TEXT,
  arxiv_id TEXT,
  summary TEXT NOT NULL DEFAULT '',
  key_findings_json TEXT NOT NULL DEFAULT '[]',
  methodology TEXT NOT NULL DEFAULT '',
  applications_json TEXT NOT NULL DEFAULT '[]',
  future_work_json TEXT NOT NULL DEFAULT '[]',
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

CREATE INDEX IF NOT EXISTS idx_datasets_project ON datasets(project_id);
CREATE INDEX IF NOT EXISTS idx_datasets_owner ON datasets(owner_id);
CREATE INDEX IF NOT EXISTS idx_project_users_user ON project_users(user_id);
CREATE INDEX IF NOT EXISTS idx_analyzed_papers_source ON analyzed_papers(source);
CREATE INDEX IF NOT EXISTS idx_analyzed_papers_created ON analyzed_papers(created_at);
`;

const stringList = z.array(z.string());

/**
 * Row shape of analyzed_papers, JSON columns still encoded.
 */
interface AnalyzedPaperRow {
    analysis_id: number;
    source_id: string;
    source: PaperSource;
    title: string;
    abstract: string | null;
    authors_json: string;
    year: number | null;
    venue: string | null;
    url: string | null;
    citations: number;
    doi: string | null;
    arxiv_id: string | null;
    summary: string;
    key_findings_json: string;
    methodology: string;
    applications_json: string;
    future_work_json: string;
    created_at: string;
}

function decodeList(json: string): string[] {
    const parsed = stringList.safeParse(JSON.parse(json));
    return parsed.success ? parsed.data : [];
}

function toAnalyzedPaper(row: AnalyzedPaperRow): AnalyzedPaper {
    return {
        analysis_id: row.analysis_id,
        source: row.source,
        source_id: row.source_id,
        doi: row.doi,
        arxiv_id: row.arxiv_id,
        title: row.title,
        abstract: row.abstract,
        authors: decodeList(row.authors_json),
        year: row.year,
        venue: row.venue,
        url: row.url,
        citations: row.citations,
        summary: row.summary,
        key_findings: decodeList(row.key_findings_json),
        methodology: row.methodology,
        applications: decodeList(row.applications_json),
        future_work: decodeList(row.future_work_json),
        created_at: row.created_at,
    };
}

/**
 * SQLite UNIQUE violations come back as SqliteError with this code.
 */
function isUniqueViolation(error: unknown): boolean {
    return error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

/**
 * Hub database wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, and CRUD operations.
 */
export class HubDatabase {
    private db: Database.Database;

    /**
     * @param options.migrate - Apply pending migrations on open (default true).
     *   `db init` opens without them so it can check connectivity first.
     */
    constructor(dbPath: string, options: { migrate?: boolean } = {}) {
        this.db = new Database(dbPath);

        // WAL is meaningless for in-memory databases
        if (dbPath !== ':memory:') {
            this.db.pragma('journal_mode = WAL');
        }
        this.db.pragma('foreign_keys = ON');

        if (options.migrate ?? true) {
            this.migrate();
        }

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run pending schema migrations and return the resulting version.
     */
    migrate(): number {
        if (this.getSchemaVersion() < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Database migrated to v1');
        }
        return this.getSchemaVersion();
    }

    /**
     * Connectivity check: runs `SELECT 1`.
     */
    checkConnection(): boolean {
        try {
            const row = this.db.prepare('SELECT 1 AS ok').get() as { ok: number } | undefined;
            const ok = row?.ok === 1;
            getLogger().info({ ok }, 'Database connection test');
            return ok;
        } catch (error) {
            getLogger().error({ err: error }, 'Database connection test failed');
            return false;
        }
    }

    getSchemaVersion(): number {
        const version = this.db.pragma('user_version', { simple: true });
        return typeof version === 'number' ? version : 0;
    }

    // ─── Users ────────────────────────────────────────────────

    createUser(user: NewUser): User {
        try {
            const result = this.db
                .prepare('INSERT INTO users (username, email) VALUES (@username, @email)')
                .run(user);
            return this.requireUser(Number(result.lastInsertRowid));
        } catch (error) {
            if (isUniqueViolation(error)) {
                throw new ConflictError('A user with that username or email already exists');
            }
            throw error;
        }
    }

    getUser(userId: number): User | undefined {
        return this.db.prepare('SELECT * FROM users WHERE user_id = ?').get(userId) as User | undefined;
    }

    listUsers(): User[] {
        return this.db.prepare('SELECT * FROM users ORDER BY user_id').all() as User[];
    }

    deleteUser(userId: number): boolean {
        return this.db.prepare('DELETE FROM users WHERE user_id = ?').run(userId).changes > 0;
    }

    private requireUser(userId: number): User {
        const user = this.getUser(userId);
        if (!user) throw new NotFoundError(`User ${userId} not found`);
        return user;
    }

    // ─── Projects ─────────────────────────────────────────────

    createProject(project: NewProject): Project {
        const result = this.db
            .prepare('INSERT INTO projects (name, description) VALUES (?, ?)')
            .run(project.name, project.description ?? null);
        return this.requireProject(Number(result.lastInsertRowid));
    }

    getProject(projectId: number): ProjectWithMembers | undefined {
        const project = this.db.prepare('SELECT * FROM projects WHERE project_id = ?').get(projectId) as Project | undefined;
        if (!project) return undefined;
        return { ...project, members: this.getProjectMembers(projectId) };
    }

    listProjects(): Project[] {
        return this.db.prepare('SELECT * FROM projects ORDER BY project_id').all() as Project[];
    }

    /**
     * Partial update. Bumps updated_at even when the values are unchanged.
     */
    updateProject(projectId: number, update: ProjectUpdate): ProjectWithMembers {
        const assignments: string[] = [];
        const params: Record<string, string | null | number> = { project_id: projectId };

        if (update.name !== undefined) {
            assignments.push('name = @name');
            params['name'] = update.name;
        }
        if (update.description !== undefined) {
            assignments.push('description = @description');
            params['description'] = update.description;
        }
        if (assignments.length === 0) {
            throw new ValidationError('Nothing to update');
        }

        const result = this.db
            .prepare(`UPDATE projects SET ${assignments.join(', ')}, updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now') WHERE project_id = @project_id`)
            .run(params);
        if (result.changes === 0) {
            throw new NotFoundError(`Project ${projectId} not found`);
        }
        return this.requireProject(projectId);
    }

    deleteProject(projectId: number): boolean {
        return this.db.prepare('DELETE FROM projects WHERE project_id = ?').run(projectId).changes > 0;
    }

    getProjectMembers(projectId: number): User[] {
        return this.db.prepare(`
      SELECT u.* FROM users u
      JOIN project_users pu ON pu.user_id = u.user_id
      WHERE pu.project_id = ?
      ORDER BY u.user_id
    `).all(projectId) as User[];
    }

    /**
     * Add a member. Adding an existing member is a no-op.
     */
    addProjectMember(projectId: number, userId: number): ProjectWithMembers {
        return this.transaction(() => {
            this.requireProject(projectId);
            this.requireUser(userId);
            this.db
                .prepare('INSERT OR IGNORE INTO project_users (project_id, user_id) VALUES (?, ?)')
                .run(projectId, userId);
            return this.requireProject(projectId);
        });
    }

    removeProjectMember(projectId: number, userId: number): boolean {
        this.requireProject(projectId);
        return this.db
            .prepare('DELETE FROM project_users WHERE project_id = ? AND user_id = ?')
            .run(projectId, userId).changes > 0;
    }

    private requireProject(projectId: number): ProjectWithMembers {
        const project = this.getProject(projectId);
        if (!project) throw new NotFoundError(`Project ${projectId} not found`);
        return project;
    }

    // ─── Datasets ─────────────────────────────────────────────

    createDataset(projectId: number, dataset: NewDataset): Dataset {
        return this.transaction(() => {
            this.requireProject(projectId);
            if (dataset.owner_id !== undefined && dataset.owner_id !== null) {
                this.requireUser(dataset.owner_id);
            }

            const result = this.db.prepare(`
        INSERT INTO datasets (name, description, file_path, owner_id, project_id)
        VALUES (@name, @description, @file_path, @owner_id, @project_id)
      `).run({
                name: dataset.name,
                description: dataset.description ?? null,
                file_path: dataset.file_path ?? null,
                owner_id: dataset.owner_id ?? null,
                project_id: projectId,
            });

            return this.requireDataset(Number(result.lastInsertRowid));
        });
    }

    getDataset(datasetId: number): Dataset | undefined {
        return this.db.prepare('SELECT * FROM datasets WHERE dataset_id = ?').get(datasetId) as Dataset | undefined;
    }

    /**
     * All datasets, or those of one project.
     */
    listDatasets(projectId?: number): Dataset[] {
        if (projectId === undefined) {
            return this.db.prepare('SELECT * FROM datasets ORDER BY dataset_id').all() as Dataset[];
        }
        this.requireProject(projectId);
        return this.db
            .prepare('SELECT * FROM datasets WHERE project_id = ? ORDER BY dataset_id')
            .all(projectId) as Dataset[];
    }

    updateDataset(datasetId: number, update: DatasetUpdate): Dataset {
        return this.transaction(() => {
            this.requireDataset(datasetId);

            const assignments: string[] = [];
            const params: Record<string, string | number | null> = { dataset_id: datasetId };

            if (update.name !== undefined) {
                assignments.push('name = @name');
                params['name'] = update.name;
            }
            if (update.description !== undefined) {
                assignments.push('description = @description');
                params['description'] = update.description;
            }
            if (update.file_path !== undefined) {
                assignments.push('file_path = @file_path');
                params['file_path'] = update.file_path;
            }
            if (update.owner_id !== undefined) {
                if (update.owner_id !== null) this.requireUser(update.owner_id);
                assignments.push('owner_id = @owner_id');
                params['owner_id'] = update.owner_id;
            }
            if (assignments.length === 0) {
                throw new ValidationError('Nothing to update');
            }

            this.db
                .prepare(`UPDATE datasets SET ${assignments.join(', ')}, updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now') WHERE dataset_id = @dataset_id`)
                .run(params);
            return this.requireDataset(datasetId);
        });
    }

    deleteDataset(datasetId: number): boolean {
        return this.db.prepare('DELETE FROM datasets WHERE dataset_id = ?').run(datasetId).changes > 0;
    }

    private requireDataset(datasetId: number): Dataset {
        const dataset = this.getDataset(datasetId);
        if (!dataset) throw new NotFoundError(`Dataset ${datasetId} not found`);
        return dataset;
    }

    // ─── Analyzed papers ──────────────────────────────────────

    /**
     * Store a paper with its analysis. Idempotent on source_id: when the
     * paper was analyzed before, the stored row is returned untouched.
     */
    storePaperAnalysis(paper: Paper, analysis: PaperAnalysis): AnalyzedPaper {
        const result = this.db.prepare(`
      INSERT OR IGNORE INTO analyzed_papers (
        source_id, source, title, abstract, authors_json, year, venue, url, citations, doi, arxiv_id,
        summary, key_findings_json, methodology, applications_json, future_work_json
      ) VALUES (
        @source_id, @source, @title, @abstract, @authors_json, @year, @venue, @url, @citations, @doi, @arxiv_id,
        @summary, @key_findings_json, @methodology, @applications_json, @future_work_json
      )
    `).run({
            source_id: paper.source_id,
            source: paper.source,
            title: paper.title,
            abstract: paper.abstract,
            authors_json: JSON.stringify(paper.authors),
            year: paper.year,
            venue: paper.venue,
            url: paper.url,
            citations: paper.citations,
            doi: paper.doi,
            arxiv_id: paper.arxiv_id,
            summary: analysis.summary,
            key_findings_json: JSON.stringify(analysis.key_findings),
            methodology: analysis.methodology,
            applications_json: JSON.stringify(analysis.applications),
            future_work_json: JSON.stringify(analysis.future_work),
        });

        if (result.changes === 0) {
            getLogger().info({ sourceId: paper.source_id }, 'Paper already analyzed');
        } else {
            getLogger().info({ sourceId: paper.source_id, title: paper.title }, 'Stored paper analysis');
        }

        const stored = this.getPaperAnalysis(paper.source_id);
        if (!stored) {
            throw new Error(`Analysis for ${paper.source_id} vanished after insert`);
        }
        return stored;
    }

    getPaperAnalysis(sourceId: string): AnalyzedPaper | undefined {
        const row = this.db
            .prepare('SELECT * FROM analyzed_papers WHERE source_id = ?')
            .get(sourceId) as AnalyzedPaperRow | undefined;
        return row ? toAnalyzedPaper(row) : undefined;
    }

    /**
     * Most recent analyses first.
     */
    getRecentAnalyses(limit = 10): AnalyzedPaper[] {
        const rows = this.db
            .prepare('SELECT * FROM analyzed_papers ORDER BY created_at DESC, analysis_id DESC LIMIT ?')
            .all(limit) as AnalyzedPaperRow[];
        return rows.map(toAnalyzedPaper);
    }

    getAnalysisStats(): AnalysisStats {
        const rows = this.db
            .prepare('SELECT source, COUNT(*) AS count FROM analyzed_papers GROUP BY source')
            .all() as Array<{ source: string; count: number }>;

        const stats: AnalysisStats = { total_papers: 0, arxiv_papers: 0, semantic_scholar_papers: 0 };
        for (const row of rows) {
            stats.total_papers += row.count;
            if (row.source === 'arxiv') stats.arxiv_papers = row.count;
            if (row.source === 'semantic_scholar') stats.semantic_scholar_papers = row.count;
        }
        return stats;
    }

    deletePaperAnalysis(sourceId: string): boolean {
        return this.db.prepare('DELETE FROM analyzed_papers WHERE source_id = ?').run(sourceId).changes > 0;
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Execute a function within a transaction.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    /**
     * Close the database connection.
     */
    close(): void {
        if (this.db.open) {
            this.db.close();
            getLogger().debug('Database closed');
        }
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}
