/**
 * One row of the distinct-activity query: the remote side has already
 * stripped the query string and collapsed duplicate slashes.
 */
export interface ActivityRow {
  method: string;
  uri: string;
}
