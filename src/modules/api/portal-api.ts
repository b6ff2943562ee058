// Main portal API orchestrator

import { AuthManager } from '../auth/auth-manager';
import { CredentialStore } from '../auth/credential-store';
import { ConfigManager, getConfigManager } from '../config/index';
import { ArchiveService } from '../archive/archive-service';
import { CourseTable } from '../course/course-table';
import { EvaluationRecord } from '../evaluation/evaluation-record';
import { EvaluationScraper } from '../evaluation/evaluation-scraper';
import { EvaluationSubmitter } from '../evaluation/evaluation-submitter';
import { Credential, EvaluationChanges } from '../../types/index';
import { APIClient } from './api-client';

export interface PortalAPIOptions {
  config?: ConfigManager;
  credentialStore?: CredentialStore;
}

export class PortalAPI {
  private config: ConfigManager;
  private authManager: AuthManager;
  private apiClient: APIClient;
  private scraper: EvaluationScraper;
  private submitter: EvaluationSubmitter;
  private archives: ArchiveService;

  constructor(options: PortalAPIOptions = {}) {
    this.config = options.config ?? getConfigManager();
    this.authManager = new AuthManager(this.config, options.credentialStore);
    this.apiClient = new APIClient(this.authManager, this.config);
    this.scraper = new EvaluationScraper(this.apiClient, this.config);
    this.submitter = new EvaluationSubmitter(this.apiClient, this.config);
    this.archives = new ArchiveService(this.apiClient);
  }

  /**
   * Validate and store a session cookie copied from the browser
   */
  async login(credential: Credential): Promise<void> {
    await this.authManager.storeCredential(credential);
  }

  /**
   * Scrape a submission review page
   */
  async getEvaluation(url: string): Promise<EvaluationRecord> {
    return this.scraper.scrape(url);
  }

  /**
   * Submit a record; resolves to the course page the portal redirected to
   */
  async setEvaluation(record: EvaluationRecord): Promise<string> {
    return this.submitter.submit(record);
  }

  /**
   * Scrape, apply the changes and submit in one go
   */
  async evaluate(url: string, changes: EvaluationChanges): Promise<EvaluationRecord> {
    const record = await this.scraper.scrape(url);

    if ('manualScore' in changes || 'penalty' in changes) {
      const manualScore = 'manualScore' in changes ? changes.manualScore : record.manualScore;
      record.setScore(manualScore, changes.penalty);
    }
    if (changes.evaluation !== undefined) {
      record.setEvaluationText(changes.evaluation);
    }
    if (changes.note !== undefined) {
      record.setNote(changes.note);
    }

    await this.submitter.submit(record);
    return record;
  }

  async getCourseTable(courseId: string): Promise<CourseTable> {
    return CourseTable.fetch(this.apiClient, this.config, courseId);
  }

  /**
   * Download and unpack the archive of a scraped submission
   */
  async downloadSubmission(record: EvaluationRecord, destDir: string): Promise<string> {
    return this.archives.download(record.downloadUrl, destDir);
  }
}
