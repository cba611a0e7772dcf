/**
 * Unit tests for ProjectManager.
 */

import { describe, it, expect } from 'vitest';
import { InvalidParameterException } from '@egeria-sdk/core';
import { NO_ELEMENTS_FOUND } from '../constants.js';
import { ProjectManager } from '../resources/ProjectManager.js';
import { OPTIONS, ROOT, element, stubFetch } from './fetchStub.js';

const PROJECTS = `${ROOT}/project-manager/projects`;

const alpha = element('p-1', 'Project', {
  qualifiedName: 'Project::Alpha',
  name: 'Alpha',
  identifier: 'A-1',
  projectStatus: 'ACTIVE',
});

describe('ProjectManager', () => {
  const client = new ProjectManager(OPTIONS);

  describe('queries', () => {
    it('should find all projects', async () => {
      const requests = stubFetch({ elements: [alpha] });

      expect(await client.findProjects()).toEqual([alpha]);
      expect(requests[0].url).toBe(`${PROJECTS}/by-search-string`);
      expect(requests[0].body).toEqual({ class: 'SearchStringRequestBody', startsWith: true });
    });

    it('should report a string result as nothing found', async () => {
      stubFetch({ elements: 'No elements found' });

      expect(await client.findProjects('Beta')).toBe(NO_ELEMENTS_FOUND);
    });

    it('should look up projects by name', async () => {
      const requests = stubFetch({ elements: [] });

      expect(await client.getProjectsByName('Alpha')).toBe(NO_ELEMENTS_FOUND);
      expect(requests[0].url).toBe(`${PROJECTS}/by-name`);
      expect(requests[0].body).toEqual({ class: 'FilterRequestBody', filter: 'Alpha' });
    });

    it('should get a project by GUID', async () => {
      const requests = stubFetch({ element: alpha });

      expect(await client.getProjectByGuid('p-1')).toEqual(alpha);
      expect(requests[0].url).toBe(`${PROJECTS}/p-1`);
      expect(requests[0].body).toEqual({ class: 'GetRequestBody', metadataElementTypeName: 'Project' });
    });

    it('should render a project as markdown', async () => {
      stubFetch({ element: alpha });

      const md = await client.getProjectByGuid('p-1', { outputFormat: 'MD' });

      expect(typeof md).toBe('string');
      expect(String(md).startsWith('# Update Project\n\n## Project Name \n\nAlpha\n\n## Qualified Name\nProject::Alpha\n\n')).toBe(
        true
      );
    });

    it('should list projects linked to an element', async () => {
      const requests = stubFetch({ elements: [alpha] });

      await client.getLinkedProjects('x-1');

      expect(requests[0].url).toBe(`${ROOT}/project-manager/metadata-elements/x-1/projects`);
      expect(requests[0].body).toEqual({ class: 'FilterRequestBody' });
    });
  });

  describe('maintenance', () => {
    it('should create a personal project', async () => {
      const requests = stubFetch({ guid: 'p-2' });

      const guid = await client.createPersonalProject({
        displayName: 'My Tasks',
        description: 'Things to do',
        startDate: '2025-01-01',
      });

      expect(guid).toBe('p-2');
      expect(requests[0].url).toBe(PROJECTS);
      expect(requests[0].body).toEqual({
        class: 'NewElementRequestBody',
        isOwnAnchor: true,
        initialClassifications: { PersonalProject: { class: 'PersonalProjectProperties' } },
        properties: {
          class: 'ProjectProperties',
          qualifiedName: 'PersonalProject::My-Tasks',
          name: 'My Tasks',
          description: 'Things to do',
          startDate: '2025-01-01',
        },
      });
    });

    it('should reject properties of another type', async () => {
      await expect(
        client.createProject({ properties: { class: 'GlossaryProperties', qualifiedName: 'Glossary::X' } })
      ).rejects.toBeInstanceOf(InvalidParameterException);
    });

    it('should require a template GUID', async () => {
      await expect(client.createProjectFromTemplate({ templateGUID: '' })).rejects.toBeInstanceOf(
        InvalidParameterException
      );
    });

    it('should delete with a cascade flag', async () => {
      const requests = stubFetch({}, {});

      await client.deleteProject('p-1');
      await client.deleteProject('p-1', true);

      expect(requests[0].url).toBe(`${PROJECTS}/p-1/delete`);
      expect(requests[0].body).toEqual({ class: 'DeleteRequestBody' });
      expect(requests[1].body).toEqual({ class: 'DeleteRequestBody', cascadeDelete: true });
    });
  });

  describe('teams and links', () => {
    it('should add a team member with a role', async () => {
      const requests = stubFetch();

      await client.addToProjectTeam('p-1', 'a-1', 'Lead');

      expect(requests[0].url).toBe(`${PROJECTS}/p-1/members/a-1/attach`);
      expect(requests[0].body).toEqual({
        class: 'NewRelationshipRequestBody',
        properties: { class: 'AssignmentScopeProperties', assignmentType: 'Lead' },
      });
    });

    it('should attach a management role without a body', async () => {
      const requests = stubFetch();

      await client.setupProjectManagementRole('p-1', 'r-1');

      expect(requests[0].url).toBe(`${PROJECTS}/p-1/project-management-roles/r-1/attach`);
      expect(requests[0].body).toBeUndefined();
    });

    it('should link and detach project dependencies', async () => {
      const requests = stubFetch({}, {});

      await client.linkProjectDependency('p-1', 'p-2', {
        properties: { class: 'ProjectDependencyProperties', description: 'Needs data' },
      });
      await client.detachProjectDependency('p-1', 'p-2');

      expect(requests[0].url).toBe(`${PROJECTS}/p-1/project-dependencies/p-2/attach`);
      expect(requests[1].url).toBe(`${PROJECTS}/p-1/project-dependencies/p-2/detach`);
      expect(requests[1].body).toBeUndefined();
    });

    it('should check the relationship property class', async () => {
      await expect(
        client.linkProjectHierarchy('p-1', 'p-2', { properties: { class: 'ProjectDependencyProperties' } })
      ).rejects.toBeInstanceOf(InvalidParameterException);
    });
  });
});
