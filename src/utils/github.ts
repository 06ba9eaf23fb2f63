import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { ApiError, AuthError, RepoCreateError, TimeoutError } from './errors';

export interface GitHubClientOptions {
  baseURL: string;
  timeoutMs: number;
  // Injected for tests; defaults to a fresh axios instance
  http?: AxiosInstance;
}

// Error responses carry a human-readable `message`
interface GitHubErrorBody {
  message: string;
}

interface GitHubUser {
  login: string;
}

interface GitHubRepo {
  clone_url: string;
}

// With validateStatus disabled the body may be either shape
type Body<T> = Partial<T & GitHubErrorBody> | undefined;

function remoteMessage(data: Body<object>, fallback: string): string {
  return typeof data?.message === 'string' && data.message ? data.message : fallback;
}

/**
 * Thin client for the two GitHub endpoints the workflow needs.
 */
export class GitHubClient {
  private readonly http: AxiosInstance;
  private readonly baseURL: string;
  private readonly timeoutMs: number;

  constructor(options: GitHubClientOptions) {
    this.baseURL = options.baseURL;
    this.timeoutMs = options.timeoutMs;
    this.http = options.http ?? axios.create();
  }

  /**
   * Check a personal access token
   * @param token personal access token
   * @returns the login GitHub reports for the token
   */
  async validateToken(token: string): Promise<string> {
    const response = await this.request(() => this.http.get<Body<GitHubUser>>('/user', this.config(token)));

    if (response.status < 200 || response.status >= 300) {
      throw new AuthError(remoteMessage(response.data, 'Token validation failed'), response.status);
    }

    const login = response.data?.login;
    if (typeof login !== 'string' || !login) {
      throw new ApiError('GitHub did not report a login for this token', response.status);
    }
    return login;
  }

  /**
   * Create a repository under the authenticated user
   * @param username owner, used when the response carries no clone URL
   * @param token personal access token
   * @param name repository name
   * @param isPrivate create as private
   * @returns clone URL of the new repository
   */
  async createRepository(username: string, token: string, name: string, isPrivate: boolean): Promise<string> {
    const response = await this.request(() => this.http.post<Body<GitHubRepo>>('/user/repos', { name, private: isPrivate }, this.config(token)));

    if (response.status !== 201) {
      throw new RepoCreateError(remoteMessage(response.data, 'Failed to create repository'), response.status);
    }

    const cloneUrl = response.data?.clone_url;
    return typeof cloneUrl === 'string' && cloneUrl ? cloneUrl : `https://github.com/${username}/${name}.git`;
  }

  private config(token: string) {
    return {
      baseURL: this.baseURL,
      headers: {
        Authorization: `token ${token}`,
        Accept: 'application/vnd.github+json',
      },
      timeout: this.timeoutMs,
      // Status codes are mapped by the caller
      validateStatus: () => true,
    };
  }

  private async request<T>(send: () => Promise<AxiosResponse<T>>): Promise<AxiosResponse<T>> {
    try {
      return await send();
    } catch (error) {
      if (axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')) {
        throw new TimeoutError(this.timeoutMs);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ApiError(`Could not reach GitHub: ${reason}`);
    }
  }
}
