/**
 * Linkcast Realtime Service
 *
 * Live click, conversion and snapshot feeds for link dashboards over
 * WebSocket. This is the entry point - just starts the server.
 */

import "./server.js";
