import { Test, TestingModule } from '@nestjs/testing';
import { AlertPluginRegistry } from './alert-plugin.registry';
import { SlackAlertPlugin } from './slack-alert.plugin';
import type { AlertPlugin } from './alert-plugin.interface';

describe('AlertPluginRegistry', () => {
  let registry: AlertPluginRegistry;
  const slackPlugin: AlertPlugin = { name: 'Slack', sendAlert: jest.fn() };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [AlertPluginRegistry, { provide: SlackAlertPlugin, useValue: slackPlugin }],
    }).compile();

    registry = module.get<AlertPluginRegistry>(AlertPluginRegistry);
  });

  it('should register the Slack plugin', () => {
    expect(registry.names()).toEqual(['Slack']);
  });

  it('should look plugins up case-insensitively', () => {
    expect(registry.get('Slack')).toBe(slackPlugin);
    expect(registry.get('slack')).toBe(slackPlugin);
    expect(registry.get('SLACK')).toBe(slackPlugin);
  });

  it('should return undefined for unknown alert types', () => {
    expect(registry.get('Email')).toBeUndefined();
  });

  it('should replace a plugin registered under the same name', () => {
    const replacement: AlertPlugin = { name: 'slack', sendAlert: jest.fn() };

    registry.register(replacement);

    expect(registry.get('Slack')).toBe(replacement);
    expect(registry.names()).toEqual(['slack']);
  });
});
