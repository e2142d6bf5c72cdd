export {
  InstrumentationException,
  InvalidDecoratorTargetException,
} from './exceptions';
