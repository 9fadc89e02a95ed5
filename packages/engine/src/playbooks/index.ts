/**
 * Playbooks
 */

import type { PlaybookName } from '@candlelab/shared';
import type { Playbook } from './base-playbook.js';
import { BreakoutPlaybook, type BreakoutParams } from './breakout.playbook.js';
import { PullbackPlaybook, type PullbackParams } from './pullback.playbook.js';

export * from './base-playbook.js';
export * from './breakout.playbook.js';
export * from './pullback.playbook.js';

/**
 * Create a playbook by name
 */
export function createPlaybook(name: 'breakout', params?: Partial<BreakoutParams>): BreakoutPlaybook;
export function createPlaybook(name: 'pullback', params?: Partial<PullbackParams>): PullbackPlaybook;
export function createPlaybook(name: PlaybookName): Playbook;
export function createPlaybook(
  name: PlaybookName,
  params: Partial<BreakoutParams> & Partial<PullbackParams> = {}
): Playbook {
  switch (name) {
    case 'breakout':
      return new BreakoutPlaybook(params);
    case 'pullback':
      return new PullbackPlaybook(params);
  }
}
