export {
  BrowserPort,
  PagePort,
  ElementHandlePort,
  NavigateOptions,
  WaitForSelectorOptions,
  ActionResult,
  NetworkResponse,
  ResponseListener,
} from './BrowserPort';
