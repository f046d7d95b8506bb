export { IIdentityProvider, IDENTITY_PROVIDER, Principal, ANONYMOUS } from './IIdentityProvider';
export { StaticTokenIdentityProvider } from './StaticTokenIdentityProvider';
