export {
  type BearerAuth,
  type BearerAuthEnv,
  type BearerAuthVariables,
  bearerAuthFromConfig,
  createBearerAuth,
  denialResponse,
  type PolicyOptions,
} from './bearerAuth/index.js';
export { userInfoRouteHandler } from './routes/userInfo.route.js';
