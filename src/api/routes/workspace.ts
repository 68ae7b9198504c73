import { Router } from 'express';
import { z } from 'zod';
import type { HubDatabase } from '../../storage/database.js';
import { NotFoundError } from '../../utils/errors.js';
import { parseId } from '../middleware.js';

const userSchema = z.object({
    username: z.string().trim().min(1).max(50),
    email: z.string().trim().email().max(120),
});

const projectSchema = z.object({
    name: z.string().trim().min(1).max(100),
    description: z.string().nullable().optional(),
});

const datasetSchema = z.object({
    name: z.string().trim().min(1).max(100),
    description: z.string().nullable().optional(),
    file_path: z.string().max(255).nullable().optional(),
    owner_id: z.number().int().positive().nullable().optional(),
});

const nonEmpty = (value: Record<string, unknown>) => Object.values(value).some((field) => field !== undefined);
const NON_EMPTY_MESSAGE = 'At least one field must be provided';

const projectUpdateSchema = projectSchema.partial().refine(nonEmpty, NON_EMPTY_MESSAGE);
const datasetUpdateSchema = datasetSchema.partial().refine(nonEmpty, NON_EMPTY_MESSAGE);

/**
 * Users, projects with their members, and datasets.
 */
export function workspaceRoutes(deps: { db: HubDatabase }): Router {
    const { db } = deps;
    const router = Router();

    // ─── Users ────────────────────────────────────────────────

    router.get('/users', (_req, res) => {
        res.json(db.listUsers());
    });

    router.post('/users', (req, res) => {
        const user = db.createUser(userSchema.parse(req.body));
        res.status(201).json(user);
    });

    router.get('/users/:userId', (req, res) => {
        const userId = parseId(req, 'userId');
        const user = db.getUser(userId);
        if (!user) throw new NotFoundError(`User ${userId} not found`);
        res.json(user);
    });

    router.delete('/users/:userId', (req, res) => {
        const userId = parseId(req, 'userId');
        if (!db.deleteUser(userId)) throw new NotFoundError(`User ${userId} not found`);
        res.status(204).end();
    });

    // ─── Projects ─────────────────────────────────────────────

    router.get('/projects', (_req, res) => {
        res.json(db.listProjects());
    });

    router.post('/projects', (req, res) => {
        const project = db.createProject(projectSchema.parse(req.body));
        res.status(201).json(project);
    });

    router.get('/projects/:projectId', (req, res) => {
        const projectId = parseId(req, 'projectId');
        const project = db.getProject(projectId);
        if (!project) throw new NotFoundError(`Project ${projectId} not found`);
        res.json(project);
    });

    router.patch('/projects/:projectId', (req, res) => {
        const projectId = parseId(req, 'projectId');
        res.json(db.updateProject(projectId, projectUpdateSchema.parse(req.body)));
    });

    router.delete('/projects/:projectId', (req, res) => {
        const projectId = parseId(req, 'projectId');
        if (!db.deleteProject(projectId)) throw new NotFoundError(`Project ${projectId} not found`);
        res.status(204).end();
    });

    router.put('/projects/:projectId/members/:userId', (req, res) => {
        res.json(db.addProjectMember(parseId(req, 'projectId'), parseId(req, 'userId')));
    });

    router.delete('/projects/:projectId/members/:userId', (req, res) => {
        const projectId = parseId(req, 'projectId');
        const userId = parseId(req, 'userId');
        if (!db.removeProjectMember(projectId, userId)) {
            throw new NotFoundError(`User ${userId} is not a member of project ${projectId}`);
        }
        res.status(204).end();
    });

    router.get('/projects/:projectId/datasets', (req, res) => {
        res.json(db.listDatasets(parseId(req, 'projectId')));
    });

    router.post('/projects/:projectId/datasets', (req, res) => {
        const projectId = parseId(req, 'projectId');
        const dataset = db.createDataset(projectId, datasetSchema.parse(req.body));
        res.status(201).json(dataset);
    });

    // ─── Datasets ─────────────────────────────────────────────

    router.get('/datasets', (_req, res) => {
        res.json(db.listDatasets());
    });

    router.get('/datasets/:datasetId', (req, res) => {
        const datasetId = parseId(req, 'datasetId');
        const dataset = db.getDataset(datasetId);
        if (!dataset) throw new NotFoundError(`Dataset ${datasetId} not found`);
        res.json(dataset);
    });

    router.patch('/datasets/:datasetId', (req, res) => {
        const datasetId = parseId(req, 'datasetId');
        res.json(db.updateDataset(datasetId, datasetUpdateSchema.parse(req.body)));
    });

    router.delete('/datasets/:datasetId', (req, res) => {
        const datasetId = parseId(req, 'datasetId');
        if (!db.deleteDataset(datasetId)) throw new NotFoundError(`Dataset ${datasetId} not found`);
        res.status(204).end();
    });

    return router;
}
