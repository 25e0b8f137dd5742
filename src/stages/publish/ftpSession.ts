// FTP session over basic-ftp, behind the minimal interface the publisher needs
import { Client } from "basic-ftp";
import type { FtpSettings } from "../../shared/env/loadConfig";

export interface RemoteSession {
  cd(dir: string): Promise<void>;
  mkdir(dir: string): Promise<void>;
  /** Binary upload of a local file into the current remote directory. */
  upload(localPath: string, remoteName: string): Promise<void>;
  close(): void;
}

export type SessionOpener = (settings: FtpSettings) => Promise<RemoteSession>;

export const openFtpSession: SessionOpener = async (settings) => {
  const client = new Client(settings.timeoutMs);
  try {
    await client.access({
      host: settings.host,
      port: settings.port,
      user: settings.username,
      password: settings.password,
      secure: settings.secure,
    });
  } catch (e) {
    client.close();
    throw e;
  }
  return {
    async cd(dir) {
      await client.cd(dir);
    },
    async mkdir(dir) {
      await client.send(`MKD ${dir}`);
    },
    async upload(localPath, remoteName) {
      await client.uploadFrom(localPath, remoteName);
    },
    close() {
      client.close();
    },
  };
};
