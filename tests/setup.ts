import { initializeLogger } from '../src/utils/logger';

initializeLogger({ logLevel: 'error', silent: true });
