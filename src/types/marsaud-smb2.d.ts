declare module '@marsaud/smb2' {
  interface SMB2Options {
    share: string;
    domain: string;
    username: string;
    password: string;
    port?: number;
    autoCloseTimeout?: number;
  }

  class SMB2 {
    constructor(options: SMB2Options);
    readdir(path: string): Promise<string[]>;
    disconnect(): void;
  }

  export = SMB2;
}
