import type { QueueSettings } from "../config";

export function isValidQueue(settings: QueueSettings, queue: string): boolean {
  return settings.valid.includes(queue);
}

export function queueName(settings: QueueSettings, routingKey: string): string {
  return settings.prefix ? `${settings.prefix}.${routingKey}` : routingKey;
}
