// src/device-state.ts

import { defaultSystemParameters } from './messages/system-parameters.js';
import type {
  DeviceIdentification,
  DeviceStateView,
  SystemParameters,
} from './types/aquaclean-types.js';

/**
 * Confirmed status snapshot plus tentative local overrides.
 *
 * An acknowledged toggle only writes the tentative layer. The next status
 * read replaces the snapshot wholesale and clears every tentative value.
 */
export class DeviceStateStore {
  private confirmed: SystemParameters = defaultSystemParameters();
  private tentative: Partial<SystemParameters> = {};
  private identification?: DeviceIdentification;
  private lastConfirmedAt: number | null = null;

  reconcile(snapshot: SystemParameters, at: number = Date.now()): void {
    this.confirmed = { ...snapshot };
    this.tentative = {};
    this.lastConfirmedAt = at;
  }

  setTentative<K extends keyof SystemParameters>(field: K, value: SystemParameters[K]): void {
    this.tentative[field] = value;
  }

  /**
   * Flips a boolean field relative to its current merged value.
   * @returns the assumed new value
   */
  toggleTentative(field: 'analShowerRunning' | 'ladyShowerRunning' | 'dryerRunning' | 'lidPosition'): boolean {
    const next = !this.get(field);
    this.tentative[field] = next;
    return next;
  }

  setIdentification(identification: DeviceIdentification): void {
    this.identification = { ...identification };
  }

  get<K extends keyof SystemParameters>(field: K): SystemParameters[K] {
    return this.tentative[field] ?? this.confirmed[field];
  }

  isTentative(field: keyof SystemParameters): boolean {
    return field in this.tentative;
  }

  get confirmedSnapshot(): SystemParameters {
    return { ...this.confirmed };
  }

  view(): DeviceStateView {
    return {
      parameters: { ...this.confirmed, ...this.tentative },
      tentative: { ...this.tentative },
      identification: this.identification ? { ...this.identification } : undefined,
      lastConfirmedAt: this.lastConfirmedAt,
    };
  }

  clear(): void {
    this.confirmed = defaultSystemParameters();
    this.tentative = {};
    this.identification = undefined;
    this.lastConfirmedAt = null;
  }
}
