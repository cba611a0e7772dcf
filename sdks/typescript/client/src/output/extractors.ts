/**
 * Property extractors and LIST columns for each element type the SDK formats.
 */

import {
  type EgeriaElement,
  elementDisplayName,
  elementGuid,
  elementProperties,
  elementStatus,
  elementTypeName,
  propertyText,
} from '../elements.js';
import type { ColumnDefinition, ExtractedProperties, PropertyExtractor } from './OutputFormatter.js';

/**
 * Builds an extractor from `[outputKey, propertyName]` pairs. The GUID, display
 * name and qualified name are always included.
 */
export function propertyExtractor(fields: ReadonlyArray<readonly [string, string]>): PropertyExtractor {
  return (element: EgeriaElement): ExtractedProperties => {
    const props = elementProperties(element);
    const result: ExtractedProperties = {
      guid: elementGuid(element) ?? '',
      display_name: elementDisplayName(element) ?? '',
      qualified_name: propertyText(props['qualifiedName']),
    };
    for (const [key, property] of fields) {
      result[key] = propertyText(props[property]);
    }
    return result;
  };
}

export const extractElementProperties: PropertyExtractor = (element) => ({
  ...propertyExtractor([['description', 'description']])(element),
  type_name: elementTypeName(element) ?? '',
});

export const extractGlossaryProperties = propertyExtractor([
  ['description', 'description'],
  ['language', 'language'],
  ['usage', 'usage'],
]);

export const extractCategoryProperties = propertyExtractor([['description', 'description']]);

export const extractTermProperties: PropertyExtractor = (element) => ({
  ...propertyExtractor([
    ['aliases', 'aliases'],
    ['summary', 'summary'],
    ['description', 'description'],
    ['abbreviation', 'abbreviation'],
    ['examples', 'examples'],
    ['usage', 'usage'],
    ['version_identifier', 'publishVersionIdentifier'],
  ])(element),
  status: elementStatus(element) ?? '',
});

export const extractProjectProperties = propertyExtractor([
  ['identifier', 'identifier'],
  ['description', 'description'],
  ['project_status', 'projectStatus'],
  ['project_phase', 'projectPhase'],
  ['project_health', 'projectHealth'],
  ['start_date', 'startDate'],
  ['planned_end_date', 'plannedEndDate'],
]);

export const extractBlueprintProperties = propertyExtractor([
  ['description', 'description'],
  ['version_identifier', 'versionIdentifier'],
]);

export const extractSolutionComponentProperties = propertyExtractor([
  ['description', 'description'],
  ['solution_component_type', 'solutionComponentType'],
  ['planned_deployed_implementation_type', 'plannedDeployedImplementationType'],
  ['version_identifier', 'versionIdentifier'],
]);

export const extractSolutionRoleProperties = propertyExtractor([
  ['identifier', 'identifier'],
  ['scope', 'scope'],
  ['description', 'description'],
]);

export const extractSupplyChainProperties = propertyExtractor([
  ['description', 'description'],
  ['scope', 'scope'],
  ['purposes', 'purposes'],
]);

export const extractGovernanceDefinitionProperties = propertyExtractor([
  ['summary', 'summary'],
  ['description', 'description'],
  ['domain_identifier', 'domainIdentifier'],
  ['scope', 'scope'],
  ['importance', 'importance'],
]);

export const extractLocationProperties = propertyExtractor([
  ['identifier', 'identifier'],
  ['description', 'description'],
  ['coordinates', 'coordinates'],
  ['map_projection', 'mapProjection'],
]);

export const extractCollectionProperties: PropertyExtractor = (element) => ({
  ...propertyExtractor([
    ['description', 'description'],
    ['collection_type', 'collectionType'],
  ])(element),
  type_name: elementTypeName(element) ?? '',
});

export const extractAssetProperties: PropertyExtractor = (element) => ({
  ...propertyExtractor([
    ['description', 'description'],
    ['deployed_implementation_type', 'deployedImplementationType'],
  ])(element),
  type_name: elementTypeName(element) ?? '',
});

/**
 * LIST columns per element type.
 */
export const COLUMNS = {
  Element: [
    { name: 'Display Name', key: 'display_name' },
    { name: 'Qualified Name', key: 'qualified_name' },
    { name: 'Type', key: 'type_name' },
    { name: 'GUID', key: 'guid' },
  ],
  Glossary: [
    { name: 'Glossary Name', key: 'display_name' },
    { name: 'Qualified Name', key: 'qualified_name' },
    { name: 'Language', key: 'language', format: true },
    { name: 'Description', key: 'description', format: true },
    { name: 'Usage', key: 'usage', format: true },
  ],
  Category: [
    { name: 'Category Name', key: 'display_name' },
    { name: 'Qualified Name', key: 'qualified_name' },
    { name: 'Description', key: 'description', format: true },
  ],
  Term: [
    { name: 'Term Name', key: 'display_name' },
    { name: 'Qualified Name', key: 'qualified_name' },
    { name: 'Summary', key: 'summary', format: true },
    { name: 'Status', key: 'status' },
    { name: 'Version', key: 'version_identifier' },
  ],
  Project: [
    { name: 'Project Name', key: 'display_name' },
    { name: 'Identifier', key: 'identifier' },
    { name: 'Status', key: 'project_status' },
    { name: 'Start Date', key: 'start_date' },
    { name: 'Planned End Date', key: 'planned_end_date' },
    { name: 'Description', key: 'description', format: true },
  ],
  'Solution Blueprint': [
    { name: 'Blueprint Name', key: 'display_name' },
    { name: 'Qualified Name', key: 'qualified_name' },
    { name: 'Version', key: 'version_identifier' },
    { name: 'Description', key: 'description', format: true },
  ],
  'Solution Component': [
    { name: 'Component Name', key: 'display_name' },
    { name: 'Component Type', key: 'solution_component_type' },
    { name: 'Version', key: 'version_identifier' },
    { name: 'Description', key: 'description', format: true },
  ],
  'Governance Definition': [
    { name: 'Title', key: 'display_name' },
    { name: 'Domain', key: 'domain_identifier' },
    { name: 'Summary', key: 'summary', format: true },
    { name: 'Importance', key: 'importance' },
  ],
  Location: [
    { name: 'Location Name', key: 'display_name' },
    { name: 'Identifier', key: 'identifier' },
    { name: 'Coordinates', key: 'coordinates' },
    { name: 'Description', key: 'description', format: true },
  ],
  Collection: [
    { name: 'Collection Name', key: 'display_name' },
    { name: 'Type', key: 'type_name' },
    { name: 'Collection Type', key: 'collection_type' },
    { name: 'Description', key: 'description', format: true },
  ],
  Asset: [
    { name: 'Asset Name', key: 'display_name' },
    { name: 'Type', key: 'type_name' },
    { name: 'Qualified Name', key: 'qualified_name' },
    { name: 'Description', key: 'description', format: true },
  ],
} satisfies Record<string, ColumnDefinition[]>;
