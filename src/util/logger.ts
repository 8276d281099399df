import pino from 'pino';
import env from './env';

import { getCommandContext } from './context';

const logger = pino({
    level: env.LOG_LEVEL,
    // Tag every line logged while a command is running
    mixin() {
        return getCommandContext() ?? {};
    },
    transport: {
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname'
        }
    }
});

export default logger;
