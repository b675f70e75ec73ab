/**
 * Example configuration written by `packrat generate-config`
 */

import * as yaml from "js-yaml";
import type { RawConfig } from "../types";

export const EXAMPLE_CONFIG: RawConfig = {
  storage: {
    provider: "s3",
    endpoint: "https://s3.example.com",
    region: "us-east-1",
    bucket: "my-backups",
    access_key: "your-access-key",
    secret_key: "your-secret-key",
  },
  backup: {
    local_backup_dir: "./backups",
    project_path: ".",
    additional_paths: [],
    retention_days: 7,
    compression_level: 3,
    exclude: ["node_modules", ".git", "target", "dist"],
  },
  database: {
    enabled: false,
    type: "postgres",
    host: "localhost",
    port: 5432,
    database: "app",
    username: "app",
  },
  system: {
    systemd_services: [],
    systemd_timers: [],
    command_outputs: [
      {
        command: "docker",
        args: ["ps", "-a"],
        output_file: "docker-ps.txt",
        enabled: false,
      },
    ],
    presets: {
      nginx_enabled: false,
      nginx_sites: [],
      crontab_enabled: false,
      user_configs: [".bashrc", ".profile"],
      etc_files: ["hosts", "fstab"],
      etc_dirs: [],
    },
  },
  logging: {
    level: "info",
    log_dir: "./logs",
  },
  daemon: {
    backup_interval_hours: 6,
    upload_interval_hours: 24,
  },
};

const HEADER = `# packrat configuration
#
# storage.provider: s3, aws, contabo, digitalocean, wasabi, minio, r2, gcs,
#   azure, b2, googledrive, onedrive, dropbox, box, mega, pcloud
# OAuth backends (googledrive, onedrive, dropbox, box, pcloud) take the
#   access token as access_key and the folder as bucket_id.
# database.password falls back to DB_PASSWORD, then DATABASE_URL in <project>/.env
`;

export function renderExampleConfig(): string {
  return `${HEADER}\n${yaml.dump(EXAMPLE_CONFIG, { lineWidth: 100 })}`;
}
