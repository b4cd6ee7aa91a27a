import type { AgentName } from '@listsmith/core';
import type { AgentDescriptor } from '@listsmith/core/agents';

/**
 * Groups agents into waves: every agent runs in the first wave after all of
 * its dependencies. Order inside a wave follows the descriptor order.
 */
export const planWaves = (descriptors: readonly AgentDescriptor[]): AgentName[][] => {
  const known = new Set(descriptors.map((descriptor) => descriptor.name));
  for (const descriptor of descriptors) {
    const unknown = descriptor.dependsOn.filter((dependency) => !known.has(dependency));
    if (unknown.length > 0) {
      throw new Error(`Agent ${descriptor.name} depends on unregistered agents: ${unknown.join(', ')}.`);
    }
  }

  const resolved = new Set<AgentName>();
  const waves: AgentName[][] = [];
  let remaining = [...descriptors];

  while (remaining.length > 0) {
    const wave = remaining.filter((descriptor) => descriptor.dependsOn.every((dependency) => resolved.has(dependency)));
    if (wave.length === 0) {
      throw new Error(
        `Agent dependencies form a cycle: ${remaining.map((descriptor) => descriptor.name).join(', ')}.`
      );
    }
    for (const descriptor of wave) {
      resolved.add(descriptor.name);
    }
    waves.push(wave.map((descriptor) => descriptor.name));
    remaining = remaining.filter((descriptor) => !resolved.has(descriptor.name));
  }

  return waves;
};
