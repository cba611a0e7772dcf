/**
 * Maintenance of glossaries, categories and terms.
 */

import { InvalidParameterException } from '@egeria-sdk/core';
import { NO_GUID_RETURNED, TERM_STATUS, isTermStatus } from '../constants.js';
import { stringField } from '../elements.js';
import type { ClientOptions } from '../IEgeriaClient.js';
import {
  ReferenceableRequestBodySchema,
  requirePropertyClass,
  validateBody,
  type ReferenceableRequestBody,
} from '../RequestBodies.js';
import { queryString } from '../ServerClient.js';
import { GlossaryBrowser } from './GlossaryBrowser.js';

/**
 * Client of the glossary manager view service. Inherits every browser query.
 */
export class GlossaryManager extends GlossaryBrowser {
  protected readonly managerRoot: string;

  constructor(options: ClientOptions) {
    super(options);
    this.managerRoot = `${this.commandRoot('glossary-manager')}/glossaries`;
  }

  /**
   * Creates a glossary; its qualified name is generated from the display name.
   * @returns The new glossary's GUID
   */
  async createGlossary(
    displayName: string,
    description: string | undefined,
    language = 'English',
    usage?: string
  ): Promise<string> {
    const body = this.validateReferenceable(
      {
        class: 'ReferenceableRequestBody',
        elementProperties: {
          class: 'GlossaryProperties',
          qualifiedName: this.createQualifiedName('Glossary', displayName),
          displayName,
          description,
          language,
          usage,
        },
      },
      ['GlossaryProperties'],
      'createGlossary'
    );
    const response = await this.post(this.managerRoot, body, 'createGlossary');
    return stringField(response.body, 'guid') ?? NO_GUID_RETURNED;
  }

  /** Deletes a glossary; with cascade its categories and terms go too. */
  async deleteGlossary(guid: string, cascade = false): Promise<void> {
    await this.post(`${this.managerRoot}/${guid}/remove${queryString({ cascadedDelete: cascade })}`, undefined, 'deleteGlossary');
  }

  /** Updates a glossary's properties. */
  async updateGlossary(guid: string, body: ReferenceableRequestBody, isMergeUpdate = true): Promise<void> {
    const validated = this.validateReferenceable(body, ['GlossaryProperties'], 'updateGlossary');
    const query = queryString({ isMergeUpdate, forLineage: false, forDuplicateProcessing: false });
    await this.post(`${this.managerRoot}/${guid}/update${query}`, validated, 'updateGlossary');
  }

  /**
   * Creates a category in a glossary.
   * @returns The new category's GUID
   */
  async createCategory(
    glossaryGuid: string,
    displayName: string,
    description: string | undefined,
    isRootCategory = false
  ): Promise<string> {
    const body = this.validateReferenceable(
      {
        class: 'ReferenceableRequestBody',
        elementProperties: {
          class: 'GlossaryCategoryProperties',
          qualifiedName: this.createQualifiedName('Category', displayName),
          displayName,
          description,
        },
      },
      ['GlossaryCategoryProperties'],
      'createCategory'
    );
    const response = await this.post(
      `${this.managerRoot}/${glossaryGuid}/categories${queryString({ isRootCategory })}`,
      body,
      'createCategory'
    );
    return stringField(response.body, 'guid') ?? NO_GUID_RETURNED;
  }

  /**
   * Updates a category.
   * @throws InvalidParameterException for a replace update without a qualified name
   */
  async updateCategory(
    guid: string,
    displayName: string,
    description: string | undefined,
    qualifiedName?: string,
    isMergeUpdate = true,
    updateDescription?: string
  ): Promise<void> {
    if (!isMergeUpdate && !qualifiedName) {
      throw new InvalidParameterException('a qualified name is required for a replace update', {
        context: this.context('updateCategory'),
      });
    }
    const body = this.validateReferenceable(
      {
        class: 'ReferenceableUpdateRequestBody',
        updateDescription,
        elementProperties: {
          class: 'GlossaryCategoryProperties',
          qualifiedName,
          displayName,
          description,
        },
      },
      ['GlossaryCategoryProperties'],
      'updateCategory'
    );
    await this.post(
      `${this.managerRoot}/categories/${guid}/update${queryString({ isMergeUpdate })}`,
      body,
      'updateCategory'
    );
  }

  /** Deletes a category. */
  async deleteCategory(guid: string): Promise<void> {
    await this.post(`${this.managerRoot}/categories/${guid}/remove`, undefined, 'deleteCategory');
  }

  /**
   * Creates a term whose lifecycle is controlled through `initialStatus`.
   * @returns The new term's GUID
   * @throws InvalidParameterException when the status is not a term status
   */
  async createControlledGlossaryTerm(glossaryGuid: string, body: ReferenceableRequestBody): Promise<string> {
    const validated = this.validateReferenceable(body, ['GlossaryTermProperties'], 'createControlledGlossaryTerm');
    this.requireTermStatus(validated.initialStatus, 'createControlledGlossaryTerm');
    const response = await this.post(
      `${this.managerRoot}/${glossaryGuid}/terms/new-controlled`,
      validated,
      'createControlledGlossaryTerm'
    );
    return stringField(response.body, 'guid') ?? NO_GUID_RETURNED;
  }

  /** Categorises a term. */
  async addTermToCategory(termGuid: string, categoryGuid: string): Promise<void> {
    await this.post(
      `${this.managerRoot}/categories/${categoryGuid}/terms/${termGuid}`,
      { class: 'RelationshipRequestBody', properties: { class: 'GlossaryTermCategorization' } },
      'addTermToCategory'
    );
  }

  /** Removes a term from a category. */
  async removeTermFromCategory(termGuid: string, categoryGuid: string): Promise<void> {
    await this.post(
      `${this.managerRoot}/categories/${categoryGuid}/terms/${termGuid}/remove`,
      undefined,
      'removeTermFromCategory'
    );
  }

  /** Updates a term's properties. */
  async updateTerm(guid: string, body: ReferenceableRequestBody, isMergeUpdate = true): Promise<void> {
    const validated = this.validateReferenceable(
      { class: 'ReferenceableUpdateRequestBody', ...body },
      ['GlossaryTermProperties'],
      'updateTerm'
    );
    const query = queryString({ isMergeUpdate, forLineage: false, forDuplicateProcessing: false });
    await this.post(`${this.managerRoot}/terms/${guid}/update${query}`, validated, 'updateTerm');
  }

  /**
   * Moves a term to a new status.
   * @throws InvalidParameterException when the status is not a term status
   */
  async updateTermStatus(guid: string, status: string): Promise<void> {
    this.requireTermStatus(status, 'updateTermStatus');
    await this.updateStatusRequest(`${this.commandRoot('glossary-manager')}/metadata-elements/${guid}/update-status`, status);
  }

  /** Deletes a term. */
  async deleteTerm(guid: string): Promise<void> {
    await this.post(
      `${this.managerRoot}/terms/${guid}/remove${queryString({ forLineage: false, forDuplicateProcessing: false })}`,
      undefined,
      'deleteTerm'
    );
  }

  private validateReferenceable(body: ReferenceableRequestBody, propertyClasses: readonly string[], caller: string) {
    const context = this.context(caller);
    const validated = validateBody(ReferenceableRequestBodySchema, body, context);
    requirePropertyClass(validated.elementProperties, propertyClasses, context);
    return validated;
  }

  private requireTermStatus(status: string | undefined, caller: string): void {
    if (status === undefined || !isTermStatus(status)) {
      throw new InvalidParameterException(`term status '${status ?? ''}' is not one of ${TERM_STATUS.join(', ')}`, {
        context: this.context(caller),
      });
    }
  }
}
