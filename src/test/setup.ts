/**
 * Global test setup.
 *
 * Registers the base matchers for state mocks (toBeUnchanged). Mock-specific
 * matchers are registered when their mock modules are imported.
 */

import "./state-mock.js";
