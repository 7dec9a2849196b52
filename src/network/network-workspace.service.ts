import {
  Injectable,
  Logger,
  NotFoundException,
  OnModuleDestroy,
  OnModuleInit,
  ServiceUnavailableException,
} from '@nestjs/common';
import { Observable, Subject } from 'rxjs';
import type { NetworkDocument } from '../persistence/network-document';
import { NetworkDocumentRepository } from '../persistence/network-document.repository';
import { unwrapResult } from '../shared/operation-result.http';
import {
  TravelTimeEstimator,
  loadTravelTimeModel,
} from '../travel-time/travel-time-estimator';
import { loadDefaultNetwork } from './network-defaults';
import {
  NetworkWorkspace,
  type NetworkOverview,
  type WorkspaceEvent,
} from './network-workspace';

function parseHistoryCapacity(raw: string | undefined): number | undefined {
  if (!raw?.trim()) {
    return undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`HISTORY_CAPACITY must be a positive integer, got "${raw}"`);
  }
  return parsed;
}

/**
 * Holds the process-wide network workspace. Results of core operations are
 * unwrapped here, so controllers only see values or Nest exceptions.
 */
@Injectable()
export class NetworkWorkspaceService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(NetworkWorkspaceService.name);
  private readonly events$ = new Subject<WorkspaceEvent>();
  private readonly documentName = process.env.NETWORK_DOCUMENT_NAME ?? 'default';
  readonly workspace: NetworkWorkspace;
  private readonly detach: () => void;

  constructor(private readonly repository: NetworkDocumentRepository) {
    const estimator = new TravelTimeEstimator(
      loadTravelTimeModel(process.env.TRAVEL_TIME_MODEL_PATH),
    );
    const defaults = loadDefaultNetwork(
      estimator.listTransportClasses().map((profile) => profile.id),
      process.env.NETWORK_DEFAULTS_PATH,
    );
    this.workspace = new NetworkWorkspace(defaults, {
      estimator,
      historyCapacity: parseHistoryCapacity(process.env.HISTORY_CAPACITY),
      defaultCityNames: defaults.cities.map((city) => city.name),
    });
    this.detach = this.workspace.subscribe((event) => {
      this.logger.debug(`[${event.type}] ${event.description}`);
      this.events$.next(event);
    });
  }

  async onModuleInit(): Promise<void> {
    if (!this.repository.isEnabled) {
      this.logger.warn('Document storage disabled, starting from the catalog defaults');
      return;
    }
    const stored = await this.repository.load(this.documentName);
    if (!stored) {
      this.logger.log(
        `No stored network document "${this.documentName}", using the catalog defaults`,
      );
      return;
    }
    const result = this.workspace.importDocument(
      stored.body,
      `Loaded network ${stored.name}`,
    );
    if (result.status !== 'ok') {
      this.logger.warn(
        `Stored network document "${stored.name}" rejected: ${result.message}`,
      );
      return;
    }
    this.logger.log(`Network document "${stored.name}" loaded`);
  }

  onModuleDestroy(): void {
    this.detach();
    this.events$.complete();
  }

  events(): Observable<WorkspaceEvent> {
    return this.events$.asObservable();
  }

  exportDocument(): NetworkDocument {
    return this.workspace.exportDocument();
  }

  importDocument(input: unknown): NetworkOverview {
    const overview = unwrapResult(this.workspace.importDocument(input));
    this.logger.log(
      `Imported network with ${overview.cities.length} cities and ${overview.connections.length} connections`,
    );
    return overview;
  }

  async saveDocument(name = this.documentName): Promise<{ name: string }> {
    this.assertStorage();
    await this.repository.save(name, this.workspace.exportDocument());
    return { name };
  }

  async loadDocument(name = this.documentName): Promise<NetworkOverview> {
    this.assertStorage();
    const stored = await this.repository.load(name);
    if (!stored) {
      throw new NotFoundException(`Network document ${name} does not exist.`);
    }
    const overview = unwrapResult(
      this.workspace.importDocument(stored.body, `Loaded network ${stored.name}`),
    );
    this.logger.log(`Network document "${stored.name}" loaded`);
    return overview;
  }

  private assertStorage(): void {
    if (!this.repository.isEnabled) {
      throw new ServiceUnavailableException(
        'Document storage is not configured. Set DATABASE_URL or DB_HOST/DB_NAME/DB_USER.',
      );
    }
  }
}
