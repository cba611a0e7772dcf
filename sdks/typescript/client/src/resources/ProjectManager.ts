/**
 * Projects, campaigns, tasks and their teams.
 */

import type { ClientOptions } from '../IEgeriaClient.js';
import { COLUMNS, extractProjectProperties } from '../output/extractors.js';
import { outputGenerator } from '../output/OutputFormatter.js';
import type {
  DeleteRequestBody,
  NewElementRequestBody,
  NewRelationshipRequestBody,
  TemplateRequestBody,
  UpdateElementRequestBody,
} from '../RequestBodies.js';
import {
  ServerClient,
  type FilterOptions,
  type FindOptions,
  type GetOptions,
  type QueryResult,
} from '../ServerClient.js';

/** Property classes accepted for projects and their subtypes. */
export const PROJECT_PROPERTY_CLASSES = [
  'ProjectProperties',
  'CampaignProperties',
  'StudyProjectProperties',
  'TaskProperties',
  'PersonalProjectProperties',
] as const;

const projectOutput = outputGenerator(extractProjectProperties, COLUMNS.Project);

/**
 * Properties of a personal project.
 */
export interface PersonalProjectProperties {
  displayName: string;
  /** Generated from the display name when omitted */
  qualifiedName?: string;
  description?: string;
  identifier?: string;
  projectStatus?: string;
  projectPhase?: string;
  projectHealth?: string;
  /** ISO date, YYYY-MM-DD */
  startDate?: string;
  /** ISO date, YYYY-MM-DD */
  plannedEndDate?: string;
}

/**
 * Client of the project manager view service.
 */
export class ProjectManager extends ServerClient {
  private readonly projectsRoot: string;

  constructor(options: ClientOptions) {
    super(options);
    this.projectsRoot = `${this.commandRoot('project-manager')}/projects`;
  }

  /** Projects linked to a parent element, optionally filtered by name. */
  async getLinkedProjects(parentGuid: string, filter = '*', options: FilterOptions = {}): Promise<QueryResult> {
    const url = `${this.commandRoot('project-manager')}/metadata-elements/${parentGuid}/projects`;
    return this.getNameRequest(url, 'Project', projectOutput, filter, options);
  }

  /** Projects carrying a classification such as StudyProject or PersonalProject. */
  async getClassifiedProjects(classification: string, options: FilterOptions = {}): Promise<QueryResult> {
    return this.getNameRequest(`${this.projectsRoot}/by-classifications`, 'Project', projectOutput, classification, options);
  }

  /** Actors on a project's team, optionally limited to one team role. */
  async getProjectTeam(projectGuid: string, teamRole = '*', options: FilterOptions = {}): Promise<QueryResult> {
    return this.getNameRequest(`${this.projectsRoot}/${projectGuid}/team`, 'Project', projectOutput, teamRole, options);
  }

  /** Projects whose properties match a search string; `*` matches all. */
  async findProjects(searchString = '*', options: FindOptions = {}): Promise<QueryResult> {
    return this.findRequest(`${this.projectsRoot}/by-search-string`, 'Project', projectOutput, searchString, options);
  }

  /** Projects with exactly this name. */
  async getProjectsByName(name: string, options: FilterOptions = {}): Promise<QueryResult> {
    return this.getNameRequest(`${this.projectsRoot}/by-name`, 'Project', projectOutput, name, options);
  }

  /** A project by its GUID. */
  async getProjectByGuid(guid: string, options: GetOptions = {}): Promise<QueryResult> {
    return this.getGuidRequest(`${this.projectsRoot}/${guid}`, 'Project', projectOutput, options);
  }

  /** A project with its related elements and mermaid graph. */
  async getProjectGraph(guid: string, options: GetOptions = {}): Promise<QueryResult> {
    return this.getGuidRequest(`${this.projectsRoot}/${guid}/graph`, 'Project', projectOutput, options);
  }

  /** Creates a project. */
  async createProject(body: NewElementRequestBody): Promise<string> {
    return this.createElementBodyRequest(this.projectsRoot, PROJECT_PROPERTY_CLASSES, body);
  }

  /**
   * Creates a project classified as a PersonalProject, anchored to itself.
   */
  async createPersonalProject(props: PersonalProjectProperties): Promise<string> {
    const { displayName, qualifiedName, ...rest } = props;
    return this.createProject({
      isOwnAnchor: true,
      initialClassifications: { PersonalProject: { class: 'PersonalProjectProperties' } },
      properties: {
        class: 'ProjectProperties',
        qualifiedName: qualifiedName ?? this.createQualifiedName('PersonalProject', displayName),
        name: displayName,
        ...rest,
      },
    });
  }

  /** Creates a project from a template. */
  async createProjectFromTemplate(body: TemplateRequestBody): Promise<string> {
    return this.createElementFromTemplate(`${this.projectsRoot}/from-template`, body);
  }

  /** Updates a project's properties. */
  async updateProject(guid: string, body: UpdateElementRequestBody): Promise<void> {
    await this.updateElementBodyRequest(`${this.projectsRoot}/${guid}/update`, PROJECT_PROPERTY_CLASSES, body);
  }

  /** Deletes a project. */
  async deleteProject(guid: string, cascade = false, body?: DeleteRequestBody): Promise<void> {
    await this.deleteRequest(`${this.projectsRoot}/${guid}/delete`, body, cascade);
  }

  /** Adds an actor to a project's team. */
  async addToProjectTeam(projectGuid: string, actorGuid: string, role?: string, description?: string): Promise<void> {
    await this.newRelationshipRequest(
      `${this.projectsRoot}/${projectGuid}/members/${actorGuid}/attach`,
      ['AssignmentScopeProperties'],
      { properties: { class: 'AssignmentScopeProperties', assignmentType: role, description } }
    );
  }

  /** Removes an actor from a project's team. */
  async removeFromProjectTeam(projectGuid: string, actorGuid: string, body?: DeleteRequestBody): Promise<void> {
    await this.deleteRelationshipRequest(`${this.projectsRoot}/${projectGuid}/members/${actorGuid}/detach`, body);
  }

  /** Makes anyone appointed to a person role a manager of the project. */
  async setupProjectManagementRole(projectGuid: string, roleGuid: string): Promise<void> {
    await this.newRelationshipRequest(
      `${this.projectsRoot}/${projectGuid}/project-management-roles/${roleGuid}/attach`,
      []
    );
  }

  /** Removes a project management role. */
  async clearProjectManagementRole(projectGuid: string, roleGuid: string): Promise<void> {
    await this.deleteRelationshipRequest(`${this.projectsRoot}/${projectGuid}/project-management-roles/${roleGuid}/detach`);
  }

  /** Records that one project depends on another. */
  async linkProjectDependency(
    projectGuid: string,
    dependsOnGuid: string,
    body?: NewRelationshipRequestBody
  ): Promise<void> {
    await this.newRelationshipRequest(
      `${this.projectsRoot}/${projectGuid}/project-dependencies/${dependsOnGuid}/attach`,
      ['ProjectDependencyProperties'],
      body
    );
  }

  /** Removes a project dependency. */
  async detachProjectDependency(projectGuid: string, dependsOnGuid: string, body?: DeleteRequestBody): Promise<void> {
    await this.deleteRelationshipRequest(
      `${this.projectsRoot}/${projectGuid}/project-dependencies/${dependsOnGuid}/detach`,
      body
    );
  }

  /** Records that one project manages another. */
  async linkProjectHierarchy(
    projectGuid: string,
    managedProjectGuid: string,
    body?: NewRelationshipRequestBody
  ): Promise<void> {
    await this.newRelationshipRequest(
      `${this.projectsRoot}/${projectGuid}/project-hierarchies/${managedProjectGuid}/attach`,
      ['ProjectHierarchyProperties'],
      body
    );
  }

  /** Removes a project hierarchy link. */
  async detachProjectHierarchy(projectGuid: string, managedProjectGuid: string, body?: DeleteRequestBody): Promise<void> {
    await this.deleteRelationshipRequest(
      `${this.projectsRoot}/${projectGuid}/project-hierarchies/${managedProjectGuid}/detach`,
      body
    );
  }
}
