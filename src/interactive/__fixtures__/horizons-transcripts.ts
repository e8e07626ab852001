/**
 * Recorded-style HORIZONS replies for session tests. Entry 0 is the
 * banner; entry n answers the n-th line the client sends.
 */

export const BANNER = [
  '',
  ' JPL Horizons, version 4.10',
  ' Type `?\' for brief intro, `?!\' for more details',
  ' System news updated Jan 01, 2018',
  '',
  'Horizons> ',
].join('\n');

export const PAGING_OFF = '\n Paging turned off.\nHorizons> ';

export const SELECT_PROMPT =
  '\n*******************************************************************************\n' +
  'JPL/HORIZONS                  (2015 HM10)                2018-Jan-01 10:00:00\n' +
  '*******************************************************************************\n' +
  ' Select ... [A]pproaches, [E]phemeris, [F]tp,[M]ail,[R]edisplay, ?, <cr>: ';

export const CONTINUE_PROMPT =
  '\n Small-body search: 2015 HM10\n Continue [ <cr>=yes, n=no, ? ] : ';

export const EPHEMERIS_TYPE_PROMPT = '\n Observe, Elements, Vectors  [o,e,v,?] : ';
export const CENTER_PROMPT = '\n Coordinate center [ <id>,coord,geo  ] : ';
export const START_PROMPT = '\n Starting UT  [>=   1900-Jan-04 00:00] : ';
export const STOP_PROMPT = '\n Ending   UT  [<=   2199-Dec-31 00:00] : ';
export const INTERVAL_PROMPT = '\n Output interval [ex: 10m, 1h, 1d, ? ] : ';
export const ACCEPT_DEFAULT_PROMPT = '\n Accept default output [ cr=(y), n, ?] : ';
export const QUANTITIES_PROMPT = '\n Select table quantities [ <#,#..>, ?] : ';

export const TABLE_ROWS =
  ' 2018-Jan-01 10:00      1.23456789\n' +
  ' 2018-Jan-08 10:00      1.30000000';

export const TABLE_OUTPUT =
  '\n Date__(UT)__HR:MN     1-way_LT\n' +
  '*********************************\n' +
  '$$SOE\n' +
  TABLE_ROWS +
  '\n$$EOE\n' +
  '*********************************\n' +
  '>>> Select... [A]gain, [N]ew-case, [F]tp, [K]ermit, [M]ail, [R]edisplay, ? : ';

export const CANDIDATES = '  99942  Apophis (alt)\n  20099942  Apophis (other)';

export const MULTIPLE_MATCHES =
  '\n Multiple major-bodies match string "APOPHIS*"\n\n' +
  '  ID#      Name                               Designation  IAU/aliases/other\n' +
  '  -------  ---------------------------------- -----------  -------------------\n' +
  CANDIDATES +
  '\n\n   Number of matches =  2. Use ID# to make unique selection.\n\nHorizons> ';

export const SMALL_BODY_CANDIDATES =
  '    54509    2000 PH5       2000 PH5       YORP\n' +
  '    99942    2004 MN4       2004 MN4       Apophis';

export const SMALL_BODY_MATCHES =
  '\n Matching small-bodies:\n\n' +
  '    Record #  Epoch-yr  >MATCH DESIG<  Primary Desig  Name\n' +
  '    --------  --------  -------------  -------------  -------------------------\n' +
  SMALL_BODY_CANDIDATES +
  '\n\n (2 matches. To SELECT, enter record # (integer), followed by semi-colon.)\n\nHorizons> ';

export const NO_MATCHES = '\n No matches found.\n\nHorizons> ';

export const DISALLOWED_DATE =
  "\n Cannot use dates before 1900-Jan-04; '1800-01-01 10:00' disallowed.\n" + START_PROMPT;

/** Prompts after the target resolves, up to and including the table */
const AFTER_SELECT = [
  EPHEMERIS_TYPE_PROMPT,
  CENTER_PROMPT,
  START_PROMPT,
  STOP_PROMPT,
  INTERVAL_PROMPT,
  ACCEPT_DEFAULT_PROMPT,
  QUANTITIES_PROMPT,
  TABLE_OUTPUT,
];

export const DIRECT_SELECT: readonly string[] = [BANNER, PAGING_OFF, SELECT_PROMPT, ...AFTER_SELECT];

export const CONTINUE_THEN_SELECT: readonly string[] = [
  BANNER,
  PAGING_OFF,
  CONTINUE_PROMPT,
  SELECT_PROMPT,
  ...AFTER_SELECT,
];

export const AMBIGUOUS: readonly string[] = [BANNER, PAGING_OFF, MULTIPLE_MATCHES];

export const CONTINUE_THEN_AMBIGUOUS: readonly string[] = [BANNER, PAGING_OFF, CONTINUE_PROMPT, MULTIPLE_MATCHES];

export const SMALL_BODIES: readonly string[] = [BANNER, PAGING_OFF, SMALL_BODY_MATCHES];

export const NOT_FOUND: readonly string[] = [BANNER, PAGING_OFF, NO_MATCHES];

export const DISALLOWED: readonly string[] = [
  BANNER,
  PAGING_OFF,
  SELECT_PROMPT,
  EPHEMERIS_TYPE_PROMPT,
  CENTER_PROMPT,
  START_PROMPT,
  DISALLOWED_DATE,
];

/** Goes silent after the target is selected */
export const STALLS_AFTER_SELECT: readonly string[] = [BANNER, PAGING_OFF, SELECT_PROMPT];

/** The same replies with the CR LF line endings of a raw capture */
export function withCrLf(script: readonly string[]): string[] {
  return script.map((entry) => entry.replace(/\n/g, '\r\n'));
}
