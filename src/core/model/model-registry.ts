import { DefinitionException } from '../exceptions/custom-exceptions';
import type { Model } from './model';

/**
 * Models declared by one owner, usually a test harness that drops their
 * storage on teardown.
 */
export class ModelRegistry {
  private readonly byName = new Map<string, Model>();

  register<M extends Model>(model: M): M {
    const existing = this.byName.get(model.name);
    if (existing && existing !== model) {
      throw new DefinitionException(`Model ${model.name} is already registered`, {
        model: model.name,
      });
    }
    this.byName.set(model.name, model);
    return model;
  }

  get(name: string): Model | undefined {
    return this.byName.get(name);
  }

  models(): Model[] {
    return [...this.byName.values()];
  }

  clear(): void {
    this.byName.clear();
  }
}
