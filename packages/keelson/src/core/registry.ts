import type { Component } from './component';
import { DuplicateComponentError, UnknownComponentError } from './errors';

/**
 * Name → component instance. Filled once at startup, read afterwards.
 * Registering a name twice is an error rather than a silent override.
 */
export class ComponentRegistry {
  private readonly components = new Map<string, Component>();

  /** Register under `component.name`, or under an explicit name. */
  register(component: Component): void;
  register(name: string, component: Component): void;
  register(nameOrComponent: string | Component, component?: Component): void {
    const name = typeof nameOrComponent === 'string' ? nameOrComponent : nameOrComponent.name;
    const instance = typeof nameOrComponent === 'string' ? component : nameOrComponent;
    if (!instance) {
      throw new TypeError(`no component given for "${name}"`);
    }
    if (this.components.has(name)) {
      throw new DuplicateComponentError(name);
    }
    this.components.set(name, instance);
  }

  lookup(name: string): Component | undefined {
    return this.components.get(name);
  }

  /** Like lookup, but an unknown name throws UnknownComponentError. */
  get(name: string): Component {
    const component = this.components.get(name);
    if (!component) {
      throw new UnknownComponentError(name, this.names());
    }
    return component;
  }

  names(): string[] {
    return [...this.components.keys()].sort();
  }
}
