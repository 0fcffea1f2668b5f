/**
 * Publisher Model
 */

import { validateStringLength } from './validation.js';
import type { NewPublisher, Publisher, PublisherDict, WithGameCount } from '../types/index.js';

export interface PublisherInput {
  name: unknown;
  description?: unknown;
}

export function validatePublisherName(name: unknown): string {
  return validateStringLength('Publisher name', name, { minLength: 2 });
}

export function validatePublisherDescription(description: unknown): string | null {
  return validateStringLength('Description', description, { minLength: 10, allowNull: true });
}

export function buildPublisher(input: PublisherInput): NewPublisher {
  return {
    name: validatePublisherName(input.name),
    description: validatePublisherDescription(input.description),
  };
}

export function serializePublisher(publisher: WithGameCount<Publisher>): PublisherDict {
  return {
    id: publisher.id,
    name: publisher.name,
    description: publisher.description,
    game_count: publisher.gameCount,
  };
}
