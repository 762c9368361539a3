// Sink exports
export { ConsoleLogSink, type ConsoleLogSinkOptions } from './ConsoleLogSink.ts';
export {
  OnScreenMessageBoard,
  type OnScreenMessage,
  type OnScreenMessageBoardOptions,
  type MessageListener,
  type ExpiryListener,
} from './OnScreenMessageBoard.ts';
