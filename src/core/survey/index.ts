/**
 * Survey Service Module
 *
 * Client boundary to the survey-collection service.
 *
 * @module
 */

import type { SurveyServiceConfig } from "../../utils/validation.js";
import type { ISurveyClient } from "./interfaces/ISurveyClient.js";
import { KoboSurveyClient } from "./impl/KoboSurveyClient.js";

// Interfaces
export * from "./interfaces/ISurveyClient.js";

// Implementation
export { KoboSurveyClient, nestXPaths, trackingInstanceId, type KoboClientConfig } from "./impl/KoboSurveyClient.js";

/**
 * Creates the survey client for a project's service settings
 */
export function createSurveyClient(config: SurveyServiceConfig): ISurveyClient {
  return new KoboSurveyClient(config);
}
