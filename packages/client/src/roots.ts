import type { Root } from '@duplexmcp/protocol';

/**
 * manages the root set the client declares to the server
 *
 * the server only ever fetches the whole set; every change is announced so
 * that the server can fetch it again.
 */
export class RootManager {
  #roots: Root[];
  #announce: () => Promise<void>;

  /**
   * creates a new root manager instance
   * @param roots initial list of root directories
   * @param announce tells the server that the root set changed
   */
  constructor(roots: Root[], announce: () => Promise<void>) {
    this.#roots = [...roots];
    this.#announce = announce;
  }

  /**
   * gets the current list of root directories
   * @returns copy of the roots array
   */
  public getRoots(): Root[] {
    return [...this.#roots];
  }

  /**
   * replaces the whole root set
   * @param roots the new root set
   */
  public async setRoots(roots: Root[]): Promise<void> {
    this.#roots = [...roots];
    await this.#announce();
  }

  /**
   * adds a new root directory
   * @param root the root directory to add
   * @returns true if the root was added, false if it already exists
   */
  public async addRoot(root: Root): Promise<boolean> {
    if (this.#roots.some(({ uri }) => uri === root.uri)) {
      return false;
    }

    this.#roots.push(root);
    await this.#announce();

    return true;
  }

  /**
   * removes a root directory by uri
   * @param uri the uri of the root directory to remove
   * @returns true if the root was removed, false if not found
   */
  public async removeRoot(uri: string): Promise<boolean> {
    const index = this.#roots.findIndex((root) => root.uri === uri);

    if (index === -1) {
      return false;
    }

    this.#roots.splice(index, 1);
    await this.#announce();

    return true;
  }
}
