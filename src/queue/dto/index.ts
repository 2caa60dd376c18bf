export * from './git-webhook.dto';
export * from './poll-event.dto';
