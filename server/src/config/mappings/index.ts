export { CHANNEL_ATTRIBUTION_RULES } from './channelAttribution.js';
