/**
 * Global test setup
 */

export async function setup(): Promise<void> {
  process.env.NODE_ENV = 'test'
  process.env.logLevel = 'silent'
  process.env.port = '3004'
  process.env.enableConsoleOutput = 'false'
  process.env.schedulerEnabled = 'false'
  process.env.warmCacheOnStartup = 'false'
  process.env.sonarrBaseUrl = 'http://sonarr.test'
  process.env.sonarrApiKey = 'test-sonarr-key'
  process.env.notionToken = 'test-notion-token'
  process.env.notionParentPageId = 'parent-page'
  process.env.youtubeApiKey = 'test-youtube-key'
  process.env.youtubeChannel = '@testchannel'
  process.env.webhookApiKey = ''
}
