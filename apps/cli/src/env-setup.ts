/**
 * Environment setup for CLI - must be imported before any other modules.
 *
 * Loads an optional .env from the working directory. Variables already set
 * in the environment win over the file.
 */
import { config } from 'dotenv';

config();
