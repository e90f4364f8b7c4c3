export {
  BusError,
  MessageValidationError,
  SignatureError,
  HandlerRegistrationError,
  PollInterruptedError,
  ReactorError,
  ConnectionClosedError,
  isBusError,
  describeError,
} from './errors';
