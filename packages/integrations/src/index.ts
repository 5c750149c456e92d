/**
 * @libforge/integrations - Hosting integrations
 *
 * Currently: publishing release archives to GitHub Releases.
 */

export * from './github/release-publisher.js';
