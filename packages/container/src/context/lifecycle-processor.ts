/*
 * LifecycleProcessor
 * ------------------
 * Starts and stops the singletons of a container that implement `Lifecycle`
 * (start/stop/isRunning).
 *
 *  - start: ascending `phase`; a component's lifecycle dependencies start first
 *  - stop: descending `phase`; a component's lifecycle dependents stop first
 *  - within a phase, start follows creation order and stop reverses it
 *
 * Only singletons that already exist are considered: lifecycle management
 * never creates components. The owning container is skipped when it is
 * registered as one of its own singletons.
 */

import type { ComponentFactory } from '../core/component-factory.js';
import type { Logger } from '../logging/logger.js';
import { isLifecycle, type Lifecycle } from '../types/types.js';

interface Member {
  readonly name: string;
  readonly component: Lifecycle;
  readonly phase: number;
}

export class LifecycleProcessor {
  private running = false;

  constructor(
    private readonly factory: ComponentFactory,
    private readonly logger: Logger,
    private readonly owner?: unknown
  ) {}

  isRunning(): boolean {
    return this.running;
  }

  /** Start every lifecycle component. */
  start(): void {
    this.startMembers(false);
    this.running = true;
  }

  stop(): void {
    this.stopMembers();
    this.running = false;
  }

  /** End of refresh: start components whose `autoStartup` is not false. */
  onRefresh(): void {
    this.startMembers(true);
    this.running = true;
  }

  /** Container close: stop everything still running. */
  onClose(): void {
    this.stopMembers();
    this.running = false;
  }

  private members(): Member[] {
    const out: Member[] = [];
    for (const name of this.factory.cache.singletonNames()) {
      const component = this.factory.cache.getSingleton(name, false);
      if (component === this.owner || !isLifecycle(component)) continue;
      out.push({ name, component, phase: component.phase ?? 0 });
    }
    return out;
  }

  private startMembers(autoStartupOnly: boolean): void {
    const members = this.members();
    const byName = new Map(members.map((m) => [m.name, m]));
    const started = new Set<string>();

    const doStart = (member: Member) => {
      if (started.has(member.name)) return;
      started.add(member.name);
      for (const dep of this.factory.cache.dependenciesOf(member.name)) {
        const dependency = byName.get(dep);
        if (dependency) doStart(dependency);
      }
      if (!member.component.isRunning()) {
        this.logger.debug(`Starting component '${member.name}'`, { phase: member.phase });
        member.component.start();
      }
    };

    for (const member of this.byPhase(members, 'asc')) {
      if (autoStartupOnly && member.component.autoStartup === false) continue;
      doStart(member);
    }
  }

  private stopMembers(): void {
    const members = this.members();
    const byName = new Map(members.map((m) => [m.name, m]));
    const stopped = new Set<string>();

    const doStop = (member: Member) => {
      if (stopped.has(member.name)) return;
      stopped.add(member.name);
      for (const dep of this.factory.cache.dependentsOf(member.name)) {
        const dependent = byName.get(dep);
        if (dependent) doStop(dependent);
      }
      if (member.component.isRunning()) {
        this.logger.debug(`Stopping component '${member.name}'`, { phase: member.phase });
        member.component.stop();
      }
    };

    for (const member of this.byPhase(members, 'desc')) doStop(member);
  }

  private byPhase(members: readonly Member[], direction: 'asc' | 'desc'): Member[] {
    const indexed = members.map((member, index) => ({ member, index }));
    indexed.sort((a, b) =>
      direction === 'asc'
        ? a.member.phase - b.member.phase || a.index - b.index
        : b.member.phase - a.member.phase || b.index - a.index
    );
    return indexed.map(({ member }) => member);
  }
}
