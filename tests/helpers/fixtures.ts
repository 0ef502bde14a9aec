/**
 * Test fixture utilities
 */

import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(...parts: string[]): string {
  return path.join(__dirname, '../fixtures', ...parts);
}

export interface TempProjectResult {
  rootDir: string;
  cleanup: () => void;
  addFile: (relativePath: string, content: string | Buffer) => string;
  removeFile: (relativePath: string) => void;
  getFilePath: (relativePath: string) => string;
}

/**
 * Create a temporary project directory with files
 */
export function createTempProject(files: Record<string, string | Buffer> = {}): TempProjectResult {
  const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'endpoint-usage-project-'));

  const addFile = (relativePath: string, content: string | Buffer): string => {
    const filePath = path.join(rootDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  for (const [relativePath, content] of Object.entries(files)) {
    addFile(relativePath, content);
  }

  const cleanup = () => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  };

  const removeFile = (relativePath: string): void => {
    const filePath = path.join(rootDir, relativePath);
    if (fs.existsSync(filePath)) {
      fs.unlinkSync(filePath);
    }
  };

  const getFilePath = (relativePath: string): string => {
    return path.join(rootDir, relativePath);
  };

  return { rootDir, cleanup, addFile, removeFile, getFilePath };
}

/**
 * A small spec in YAML form
 */
export const SAMPLE_SPEC_YAML = `
openapi: 3.0.3
info:
  title: Sample API
  version: 1.0.0
paths:
  /api/users:
    get:
      summary: List users
    post:
      summary: Create user
  /api/users/{id}:
    parameters:
      - name: id
        in: path
        required: true
    get:
      summary: Get user
    put:
      summary: Replace user
    delete:
      summary: Delete user
  /api/health:
    get:
      summary: Health check
`;

/**
 * Client code calling three of the six SAMPLE_SPEC_YAML endpoints
 */
export const SAMPLE_CLIENT = `
import { createClient } from './client';

const client = createClient({ baseUrl: 'https://api.example.test' });

export async function listUsers() {
  const response = await client.GET('/api/users');
  return response.data;
}

export async function createUser(body: unknown) {
  const response = await client.POST('/api/users', { body });
  return response.data;
}

export async function getUser(id: string) {
  return api.get(\`/api/users/\${id}\`);
}

export async function getFirstUser() {
  return api.get('/api/users/1');
}
`;
