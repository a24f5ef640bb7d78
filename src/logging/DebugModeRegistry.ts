/**
 * Debug Mode Registry
 *
 * Per-component log level overrides. Module-scoped state with a reset for tests.
 *
 * Components register themselves when their module loads (e.g. "x12-parser").
 * DEBUG or TRACE output can then be switched on for a single component
 * without raising the global level.
 */

import { LogLevel, parseLogLevel, shouldDisplayLogLevel } from './LogLevel.js';

interface ComponentRegistration {
  name: string;
  description: string;
  levelOverride?: LogLevel;
}

export interface RegisteredComponent {
  name: string;
  description: string;
  effectiveLevel: LogLevel;
  hasOverride: boolean;
}

const registry = new Map<string, ComponentRegistration>();

/**
 * Register a loggable component.
 */
export function registerComponent(name: string, description: string, defaultLevel?: LogLevel): void {
  registry.set(name, {
    name,
    description,
    levelOverride: defaultLevel,
  });
}

/**
 * Override the global level for one component.
 */
export function setComponentLevel(name: string, level: LogLevel): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = level;
  } else {
    registry.set(name, { name, description: name, levelOverride: level });
  }
}

export function clearComponentLevel(name: string): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = undefined;
  }
}

/**
 * The component's override if set, otherwise the global level.
 */
export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  return registry.get(name)?.levelOverride ?? globalLevel;
}

export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  const effectiveLevel = getEffectiveLevel(name, globalLevel);
  return shouldDisplayLogLevel(messageLevel, effectiveLevel);
}

/**
 * All registered components with their effective levels, sorted by name.
 */
export function getRegisteredComponents(globalLevel: LogLevel): RegisteredComponent[] {
  const result: RegisteredComponent[] = [];

  for (const [, reg] of registry) {
    result.push({
      name: reg.name,
      description: reg.description,
      effectiveLevel: reg.levelOverride ?? globalLevel,
      hasOverride: reg.levelOverride !== undefined,
    });
  }

  return result.sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Apply overrides from entries like ["x12-parser", "x12-parser.assembler:TRACE"].
 * Entries without a level suffix get DEBUG.
 */
export function initFromEnv(debugComponents: string[]): void {
  for (const entry of debugComponents) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      const name = entry.substring(0, colonIndex);
      setComponentLevel(name, parseLogLevel(entry.substring(colonIndex + 1)));
    } else {
      setComponentLevel(entry, LogLevel.DEBUG);
    }
  }
}

/**
 * Reset all registry state (for testing)
 */
export function resetDebugRegistry(): void {
  registry.clear();
}
