import { InvalidConfigurationError } from '../errors/tailerError';

// Project IDs, including legacy domain-scoped ones (example.com:my-project)
const PROJECT_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9.:_-]*$/;

export function isValidProjectId(projectId: string): boolean {
  return PROJECT_ID_PATTERN.test(projectId);
}

export function assertProjectId(projectId: string): void {
  if (!projectId.trim()) {
    throw new InvalidConfigurationError('Project ID is required');
  }
  if (!isValidProjectId(projectId)) {
    throw new InvalidConfigurationError(`Invalid project ID: '${projectId}'`);
  }
}
