import { AppError } from "@/lib/errors/app-error";
import { createSupabaseServiceClient } from "@/lib/supabase/clients";
import { getServiceCredentials } from "@/lib/supabase/config";

export interface RemoteBlobReader {
  download(bucket: string, key: string): Promise<string>;
}

export function createSupabaseBlobReader(): RemoteBlobReader | null {
  const credentials = getServiceCredentials();
  if (!credentials) {
    return null;
  }

  const client = createSupabaseServiceClient(credentials);

  return {
    async download(bucket, key) {
      const { data, error } = await client.storage.from(bucket).download(key);
      if (error || !data) {
        throw new AppError(
          `Storage object ${bucket}/${key} could not be downloaded: ${error?.message ?? "empty body"}`,
          "COOKIE_REMOTE_FETCH_FAILED",
          502,
        );
      }
      return data.text();
    },
  };
}
