// Public entry point of the BRUTE client

export * from './types/index';
export * from './modules/errors/index';
export { ConfigManager, getConfigManager, initializeConfig, AppConfig, RichTextVariant } from './modules/config/index';
export { AuthManager } from './modules/auth/auth-manager';
export { CredentialStore, parseCredentialLine } from './modules/auth/credential-store';
export { APIClient } from './modules/api/api-client';
export { PortalAPI, PortalAPIOptions } from './modules/api/portal-api';
export * from './modules/evaluation/index';
export { CourseTable, ParallelTable } from './modules/course/course-table';
export { ArchiveService } from './modules/archive/archive-service';
export * from './modules/ui/format';
