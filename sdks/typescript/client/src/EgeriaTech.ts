/**
 * One entry point over every view-service client, sharing a single bearer
 * token between them.
 */

import type { ClientOptions } from './IEgeriaClient.js';
import { AssetCatalog } from './resources/AssetCatalog.js';
import { CollectionManager } from './resources/CollectionManager.js';
import { GlossaryManager } from './resources/GlossaryManager.js';
import { GovernanceOfficer } from './resources/GovernanceOfficer.js';
import { LocationArena } from './resources/LocationArena.js';
import { ProjectManager } from './resources/ProjectManager.js';
import { SolutionArchitect } from './resources/SolutionArchitect.js';
import { ServerClient } from './ServerClient.js';

/**
 * Facade over the resource clients of one view server.
 *
 * @example
 * ```typescript
 * const egeria = new EgeriaTech({ platformUrl, viewServer, userId, userPassword });
 * await egeria.createEgeriaBearerToken();
 * const glossaries = await egeria.glossary.findGlossaries('*', { outputFormat: 'LIST' });
 * ```
 */
export class EgeriaTech {
  readonly elements: ServerClient;
  readonly glossary: GlossaryManager;
  readonly projects: ProjectManager;
  readonly solutions: SolutionArchitect;
  readonly governance: GovernanceOfficer;
  readonly locations: LocationArena;
  readonly collections: CollectionManager;
  readonly assets: AssetCatalog;

  constructor(options: ClientOptions) {
    this.elements = new ServerClient(options);
    this.glossary = new GlossaryManager(options);
    this.projects = new ProjectManager(options);
    this.solutions = new SolutionArchitect(options);
    this.governance = new GovernanceOfficer(options);
    this.locations = new LocationArena(options);
    this.collections = new CollectionManager(options);
    this.assets = new AssetCatalog(options);
  }

  /** Every client, the element client first. */
  get clients(): ServerClient[] {
    return [
      this.elements,
      this.glossary,
      this.projects,
      this.solutions,
      this.governance,
      this.locations,
      this.collections,
      this.assets,
    ];
  }

  /**
   * Obtains a token through the element client and hands it to the others.
   */
  async createEgeriaBearerToken(userId?: string, password?: string): Promise<string> {
    const token = await this.elements.createEgeriaBearerToken(userId, password);
    this.shareToken(token);
    return token;
  }

  async refreshEgeriaBearerToken(): Promise<string> {
    const token = await this.elements.refreshEgeriaBearerToken();
    this.shareToken(token);
    return token;
  }

  setBearerToken(token: string): void {
    for (const client of this.clients) {
      client.setBearerToken(token);
    }
  }

  close(): void {
    for (const client of this.clients) {
      client.close();
    }
  }

  private shareToken(token: string): void {
    for (const client of this.clients.slice(1)) {
      client.setBearerToken(token);
    }
  }
}
