import {
  ConflictException,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import type { NetworkDocument } from '../persistence/network-document';
import {
  NetworkDocumentRepository,
  type StoredNetworkDocument,
} from '../persistence/network-document.repository';
import { HistoryController } from '../history/history.controller';
import { NetworkController } from './network.controller';
import { CoordinateDto, CreateConnectionDto } from './network.dto';
import type { WorkspaceEvent } from './network-workspace';
import { NetworkWorkspaceService } from './network-workspace.service';

class InMemoryDocumentRepository extends NetworkDocumentRepository {
  readonly documents = new Map<string, unknown>();

  constructor() {
    super(new DatabaseService());
  }

  override get isEnabled(): boolean {
    return true;
  }

  override async load(name: string): Promise<StoredNetworkDocument | null> {
    const body = this.documents.get(name);
    return body === undefined
      ? null
      : { name, body, updatedAt: '2024-05-01T08:00:00.000Z' };
  }

  override async save(name: string, document: NetworkDocument): Promise<void> {
    this.documents.set(name, structuredClone(document));
  }
}

describe('NetworkWorkspaceService', () => {
  const disabledRepository = () => new NetworkDocumentRepository(new DatabaseService());

  it('seeds the workspace from the catalog defaults', async () => {
    const service = new NetworkWorkspaceService(disabledRepository());
    await service.onModuleInit();

    const overview = service.workspace.overview();
    expect(overview.cities).toHaveLength(16);
    expect(overview.connections).toHaveLength(15);

    const chains = service.workspace.chainSummaries();
    expect(chains).toHaveLength(1);
    expect(chains[0].cities[0]).toBe('Frankfurt');
    expect(chains[0].cities[15]).toBe('Mainz');
    expect(chains[0].totalMinutes).toBe(1710);
    expect(chains[0].formattedTotal).toBe('28h 30m');
  });

  it('loads the stored default document on start', async () => {
    const repository = new InMemoryDocumentRepository();
    repository.documents.set('default', {
      cities: { Kiel: [10.13, 54.32], Lübeck: [10.69, 53.87] },
      connections: [['Kiel', 'Lübeck']],
    });
    const service = new NetworkWorkspaceService(repository);

    await service.onModuleInit();

    expect(service.workspace.store.listConnections()).toEqual([{ from: 'Kiel', to: 'Lübeck' }]);
    expect(service.workspace.historyEntries().map((entry) => entry.description)).toEqual([
      'Loaded network default',
    ]);
  });

  it('keeps the defaults when the stored document is invalid', async () => {
    const repository = new InMemoryDocumentRepository();
    repository.documents.set('default', { cities: [] });
    const service = new NetworkWorkspaceService(repository);

    await service.onModuleInit();

    expect(service.workspace.store.listCities()).toHaveLength(16);
  });

  it('saves and reloads named documents', async () => {
    const repository = new InMemoryDocumentRepository();
    const service = new NetworkWorkspaceService(repository);
    await service.saveDocument('snapshot');
    service.workspace.removeCity('Berlin');

    const overview = await service.loadDocument('snapshot');

    expect(overview.cities).toHaveLength(16);
    await expect(service.loadDocument('missing')).rejects.toBeInstanceOf(NotFoundException);
  });

  it('refuses storage operations without a database', async () => {
    const service = new NetworkWorkspaceService(disabledRepository());

    await expect(service.saveDocument()).rejects.toBeInstanceOf(ServiceUnavailableException);
    await expect(service.loadDocument()).rejects.toBeInstanceOf(ServiceUnavailableException);
  });

  it('streams workspace events until destroyed', () => {
    const service = new NetworkWorkspaceService(disabledRepository());
    const events: WorkspaceEvent[] = [];
    let completed = false;
    service.events().subscribe({
      next: (event) => events.push(event),
      complete: () => {
        completed = true;
      },
    });

    service.workspace.addCity('Kassel', { lon: 9.48, lat: 51.31 });
    service.onModuleDestroy();

    expect(events.map((event) => [event.type, event.description])).toEqual([
      ['recorded', 'City Kassel added.'],
    ]);
    expect(completed).toBe(true);
  });

  describe('history capacity from the environment', () => {
    const previous = process.env.HISTORY_CAPACITY;
    afterEach(() => {
      if (previous === undefined) {
        delete process.env.HISTORY_CAPACITY;
      } else {
        process.env.HISTORY_CAPACITY = previous;
      }
    });

    it('applies a configured capacity', () => {
      process.env.HISTORY_CAPACITY = '5';
      expect(new NetworkWorkspaceService(disabledRepository()).workspace.historyCapacity).toBe(5);
    });

    it('rejects a capacity that is not a positive integer', () => {
      process.env.HISTORY_CAPACITY = 'zero';
      expect(() => new NetworkWorkspaceService(disabledRepository())).toThrow(
        'HISTORY_CAPACITY must be a positive integer, got "zero"',
      );
    });
  });
});

describe('workspace controllers', () => {
  const makeControllers = () => {
    const service = new NetworkWorkspaceService(
      new NetworkDocumentRepository(new DatabaseService()),
    );
    return {
      network: new NetworkController(service),
      history: new HistoryController(service),
    };
  };

  it('maps a duplicate connection to a conflict', () => {
    const { network } = makeControllers();
    const body = Object.assign(new CreateConnectionDto(), { from: 'Mannheim', to: 'Frankfurt' });

    expect(() => network.addConnection(body)).toThrow(ConflictException);
  });

  it('maps an unknown city to not found', () => {
    const { network } = makeControllers();
    expect(() => network.removeCity('Atlantis')).toThrow(NotFoundException);
  });

  it('removes the catalog cities once', () => {
    const { network } = makeControllers();

    const result = network.removeDefaultCities();

    expect(result.cities).toHaveLength(16);
    expect(result.removed).toHaveLength(15);
    expect(() => network.removeDefaultCities()).toThrow(NotFoundException);
  });

  it('maps an empty undo stack to a conflict', () => {
    const { history } = makeControllers();
    expect(() => history.undo()).toThrow('Nothing to undo');
  });

  it('undoes an edit made through the API', () => {
    const { network, history } = makeControllers();
    network.addCity('Kassel', Object.assign(new CoordinateDto(), { lon: 9.48, lat: 51.31 }));

    expect(history.undo()).toMatchObject({ message: 'Undid: City Kassel added.' });
    expect(history.list().canRedo).toBe(true);
  });
});
