import { ConfigurationError } from '../errors.js';
import type { Capability } from './capability.js';
import { Model, type ModelConfig } from './model.js';

/**
 * Model classes by name. A capability belongs to at most one model of the
 * catalog; assigning it elsewhere takes it out of its previous model.
 */
export class ModelCatalog {
  private readonly models = new Map<string, Model>();

  define(model: Model | ModelConfig): Model {
    const defined = model instanceof Model ? model : new Model(model);
    if (this.models.has(defined.name)) {
      throw new ConfigurationError(`A model named "${defined.name}" is already defined`);
    }
    this.models.set(defined.name, defined);
    return defined;
  }

  get(name: string): Model {
    const model = this.models.get(name);
    if (model === undefined) throw new ConfigurationError(`No model named "${name}"`);
    return model;
  }

  has(name: string): boolean {
    return this.models.has(name);
  }

  names(): string[] {
    return [...this.models.keys()];
  }

  /** Registers `capability` with the named model, removing it from any other. */
  assign(capability: Capability, modelName: string): Model {
    const target = this.get(modelName);
    for (const model of this.models.values()) {
      if (model !== target) model.unregister(capability);
    }
    target.register(capability);
    return target;
  }

  ownerOf(capability: Capability): Model | null {
    for (const model of this.models.values()) {
      if (model.registry.has(capability)) return model;
    }
    return null;
  }
}
