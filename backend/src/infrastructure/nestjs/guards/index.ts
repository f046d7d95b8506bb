export { ApiTokenGuard, AuthenticatedRequest, CurrentPrincipal, bearerToken } from './api-token.guard';
