/**
 * Workspace entities: users, projects they collaborate on, and the datasets
 * attached to those projects.
 */
export interface User {
    user_id: number;
    username: string;
    email: string;
    created_at: string;
}

export interface Project {
    project_id: number;
    name: string;
    description: string | null;
    created_at: string;
    updated_at: string;
}

export interface ProjectWithMembers extends Project {
    members: User[];
}

export interface Dataset {
    dataset_id: number;
    name: string;
    description: string | null;
    /** Location of the dataset file, relative to wherever datasets are kept */
    file_path: string | null;
    owner_id: number | null;
    project_id: number;
    created_at: string;
    updated_at: string;
}

export type NewUser = Pick<User, 'username' | 'email'>;

export interface NewProject {
    name: string;
    description?: string | null;
}

export type ProjectUpdate = Partial<NewProject>;

export interface NewDataset {
    name: string;
    description?: string | null;
    file_path?: string | null;
    owner_id?: number | null;
}

export type DatasetUpdate = Partial<NewDataset>;
