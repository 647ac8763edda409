/**
 * Server module exports
 */

export { createApp, getServerInfo } from './app.js';
export {
    createFileResponder,
    type FileResponderOptions,
} from './file-responder.js';
export {
    readConfigFile,
    loadSiteConfig,
    directoryExists,
    resolveRootDir,
} from './loader.js';
