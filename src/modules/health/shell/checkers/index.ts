export {
  makeCredentialChecker,
  type CredentialCheckerOptions,
} from './credential-checker.js';
