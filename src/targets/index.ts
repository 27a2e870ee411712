import { displayName } from '../display/index.ts';
import { ISA, type ProjectGraph, type TargetNode } from '../pbxproj/index.ts';

/**
 * Suffix tried when no target carries a group's exact name; app extensions
 * (widgets, intents) usually live in a group named without it.
 */
export const TARGET_NAME_SUFFIX = 'Extension';

/**
 * Native targets by display name, built once per walk.
 */
export class TargetIndex {
  private constructor(private readonly byName: ReadonlyMap<string, TargetNode>) {}

  /**
   * Index the project's declared native targets. A later target wins a name clash.
   */
  static build(graph: ProjectGraph): TargetIndex {
    const byName = new Map<string, TargetNode>();
    for (const target of graph.targets()) {
      if (target.isa === ISA.nativeTarget) {
        byName.set(displayName(target), target);
      }
    }
    return new TargetIndex(byName);
  }

  get size(): number {
    return this.byName.size;
  }

  /**
   * Find the target for a group name, trying the exact name before name + "Extension".
   */
  find(name: string): TargetNode | undefined {
    return this.byName.get(name) ?? this.byName.get(`${name}${TARGET_NAME_SUFFIX}`);
  }
}
