export { LogServer, createLogServer, type LogServerOptions, type LogServerAddress } from './log-server.js';
