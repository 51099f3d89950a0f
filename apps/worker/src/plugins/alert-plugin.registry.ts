import { Injectable, Logger } from '@nestjs/common';
import type { AlertPlugin } from './alert-plugin.interface';
import { SlackAlertPlugin } from './slack-alert.plugin';

/**
 * Alert plugins by name, matched case-insensitively against a job's alert types
 */
@Injectable()
export class AlertPluginRegistry {
  private readonly logger = new Logger(AlertPluginRegistry.name);
  private readonly plugins = new Map<string, AlertPlugin>();

  constructor(slack: SlackAlertPlugin) {
    this.register(slack);
  }

  register(plugin: AlertPlugin): void {
    const key = plugin.name.toLowerCase();
    if (this.plugins.has(key)) {
      this.logger.warn(`Replacing alert plugin ${plugin.name}`);
    }
    this.plugins.set(key, plugin);
  }

  get(name: string): AlertPlugin | undefined {
    return this.plugins.get(name.toLowerCase());
  }

  names(): string[] {
    return [...this.plugins.values()].map((plugin) => plugin.name);
  }
}
