export const INSTRUCTIONS = `
# Field census sync

This server holds taxpayer and parcel records captured offline and sends them
to the census backend when a connection is available.

- **Capture:** \`submit_taxpayer\`, \`submit_parcel\` (saved locally as pending)
- **Correct mistakes:** \`delete_record\` (removes the record and its photos for good)
- **Send:** \`export_records\` (chunked upload; accepted records leave the device)
- **Lookups:** \`sync_reference_data\` (refresh communes, quartiers, avenues, activity and zone types)
- **Check:** \`sync_status\` (counts), \`list_records\` (per-record state and errors)

## Capturing records

- Address, activity and zone fields are ids from the local lookup tables.
  Run \`sync_reference_data\` once connectivity is available so the ids match
  the backend's.
- Attachments are paths of photos already on disk. The server takes ownership
  of them: they are deleted when the record is exported or deleted.

## Exporting

- Records are sent oldest first. A failed chunk is kept and marked failed;
  the next \`export_records\` call retries it. \`list_records\` with
  status \`failed\` shows which records were rejected and why.
- If the export reports an authentication failure, check the configured
  credentials before retrying. Nothing is lost.
- Only one export per record kind runs at a time. Reference synchronization
  is refused while an export runs, and exports are refused while it runs;
  retry once the other operation has finished.
`.trim();
