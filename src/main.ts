/**
 * Browser entry point for the free games timeline page
 */

import { initTimelinePage } from './timeline/index.js';
import { setupGlobalErrorHandler } from './utils/errorHandler.js';
import { logger } from './utils/logger.js';

function boot(): void {
  logger.info('Initializing free games history...');
  initTimelinePage()
    .then(engine => {
      if (engine) {
        logger.info('Application initialized successfully');
      }
    })
    .catch(error => {
      logger.exception('Timeline initialization failed', error);
    });
}

setupGlobalErrorHandler();

if (document.readyState === 'loading') {
  document.addEventListener('DOMContentLoaded', boot);
} else {
  boot();
}
