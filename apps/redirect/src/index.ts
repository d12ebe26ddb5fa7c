/**
 * Waypost Redirect Service
 *
 * Entry point - just starts the server.
 */

import "./server.js";
