import type { Destinations } from './lib/result.js';

export const DEFAULT_DESTINATIONS: Destinations = [ 'google.com', 'facebook.com', 'nytimes.com' ];

/** Anycast resolvers, close to every network. */
export const LAST_MILE_DESTINATIONS: Destinations = {
	'8.8.8.8': 'Google_DNS',
	'1.1.1.1': 'Cloudflare_DNS',
};
