import { logger, type ILogger } from '../config/logger';
import { getQueueConfig, type INotificationQueue } from '../queue/queue-config';
import type { LifecycleNotification } from '../types/notification';
import type { INotificationDispatcher } from './lifecycle-coordinator.service';

/**
 * Notification Dispatcher
 *
 * Hands lifecycle notifications to the `notifications` queue. Delivery
 * happens in a separate service.
 */
export class NotificationDispatcherService implements INotificationDispatcher {
    constructor(
        private queue: INotificationQueue,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): NotificationDispatcherService {
        return new NotificationDispatcherService(getQueueConfig().getNotificationQueue(), logger);
    }

    async notify(notification: LifecycleNotification): Promise<void> {
        await this.queue.add(notification.type, notification);
        this.logger.info({
            type: notification.type,
            applicationId: notification.applicationId
        }, 'Notification queued');
    }
}
