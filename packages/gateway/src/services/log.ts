/**
 * Logging utility, re-exported from @wetlands/core
 *
 *   import { getLog } from '../services/log.js';
 *   const log = getLog('Chat');
 *   log.info('Answered question', { conversationId: '...' });
 */

export { getLog } from '@wetlands/core';
