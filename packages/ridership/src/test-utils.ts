import AdmZip from "adm-zip";

/** Builds an in-memory zip. adm-zip stores the entries sorted by name. */
export function zipOf(files: Record<string, string>): Buffer {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(files)) {
    zip.addFile(name, Buffer.from(content, "utf8"));
  }
  return zip.toBuffer();
}

export const CURRENT_HEADER =
  "ride_id,rideable_type,started_at,ended_at,start_station_name,start_station_id,end_station_name,end_station_id,start_lat,start_lng,end_lat,end_lng,member_casual";

/** One row in the current export layout. Empty strings leave a column blank. */
export function currentRow(r: {
  id: string;
  start: string;
  end?: string;
  from?: [string, string];
  to?: [string, string];
  rider: string;
}): string {
  const [fromName, fromId] = r.from ?? ["", ""];
  const [toName, toId] = r.to ?? ["", ""];
  return [
    r.id,
    "classic_bike",
    r.start,
    r.end ?? "",
    fromName,
    fromId,
    toName,
    toId,
    "40.72",
    "-74.04",
    "40.73",
    "-74.05",
    r.rider,
  ].join(",");
}

export const csvOf = (header: string, rows: string[]) => `${[header, ...rows].join("\n")}\n`;
