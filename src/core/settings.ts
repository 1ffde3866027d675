/**
 * Subscriber-facing settings mutations (toggle a job, change city) plus
 * the follow/unfollow lifecycle. Every write goes straight to the
 * subscription store, so the next dispatch sees it.
 */

import { logger, redactId } from '../middleware/logger.js';
import type { SubscriptionStore } from '../utils/db-backend.js';
import { isSupportedCity, normalizeCity, SUPPORTED_CITIES } from '../utils/cities.js';
import { InvalidSettingError } from './errors.js';
import { isJobType, type JobType, type Subscriber } from './job-types.js';

export class SettingsService {
  constructor(private readonly store: SubscriptionStore) {}

  getSettings(subscriberId: string): Promise<Subscriber | undefined> {
    return this.store.getSettings(subscriberId);
  }

  async setEnabled(subscriberId: string, jobType: JobType | string, enabled: boolean): Promise<Subscriber> {
    if (!isJobType(jobType)) {
      throw new InvalidSettingError(`Unknown job type: ${jobType}`);
    }
    const updated = await this.store.setEnabled(subscriberId, jobType, enabled);
    logger.info({ subscriber: redactId(subscriberId), jobType, enabled }, 'Subscription toggled');
    return updated;
  }

  async setCity(subscriberId: string, city: string): Promise<Subscriber> {
    const normalized = normalizeCity(city);
    if (!isSupportedCity(normalized)) {
      throw new InvalidSettingError(`Unsupported city: ${city} (expected one of ${SUPPORTED_CITIES.join(', ')})`);
    }
    const updated = await this.store.setCity(subscriberId, normalized);
    logger.info({ subscriber: redactId(subscriberId), city: normalized }, 'Preferred city updated');
    return updated;
  }

  /** First contact or re-follow: make sure a record exists; enables nothing */
  async handleFollow(subscriberId: string): Promise<Subscriber> {
    const subscriber = await this.store.ensureSubscriber(subscriberId);
    logger.info({ subscriber: redactId(subscriberId) }, 'Subscriber followed');
    return subscriber;
  }

  /** Blocked or unfollowed: stop all deliveries but keep the record */
  async handleUnfollow(subscriberId: string): Promise<void> {
    await this.store.disableAll(subscriberId);
    logger.info({ subscriber: redactId(subscriberId) }, 'Subscriber unfollowed — all jobs disabled');
  }
}
