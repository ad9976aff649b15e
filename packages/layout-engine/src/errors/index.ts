export { LayoutConfigurationError } from './layout-configuration-error';
export {
  LayoutInputError,
  type LayoutInputErrorReason,
} from './layout-input-error';
