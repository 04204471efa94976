import { describe, it, expect } from 'vitest';
import { formatReportCsv, formatReportTable, reportRecords } from '../../src/operations/report.js';
import type { ReportRow } from '../../src/types.js';

const rows: ReportRow[] = [
  {
    original: 'a.jpg',
    newName: 'img_1_.jpg',
    width: 10,
    height: 5,
    format: 'JPEG',
    metadataRemoved: true,
    gpsPresentBefore: 'Yes',
  },
  {
    original: 'long_name_here.png',
    newName: 'x.png',
    width: 1200,
    height: 800,
    format: 'PNG',
    metadataRemoved: false,
    gpsPresentBefore: 'No',
  },
];

describe('formatReportCsv', () => {
  it('should write a header and one line per row', () => {
    expect(formatReportCsv(rows)).toBe(
      'original,new_name,width,height,format,exif_removed,gps_present_before\n' +
        'a.jpg,img_1_.jpg,10,5,JPEG,true,Yes\n' +
        'long_name_here.png,x.png,1200,800,PNG,false,No\n',
    );
  });

  it('should quote fields with separators or quotes', () => {
    const [first] = rows;
    if (!first) throw new Error('fixture missing');
    const csv = formatReportCsv([{ ...first, original: 'say "hi", ok.jpg' }]);
    expect(csv.split('\n')[1]).toBe('"say ""hi"", ok.jpg",img_1_.jpg,10,5,JPEG,true,Yes');
  });

  it('should write only the header for an empty batch', () => {
    expect(formatReportCsv([])).toBe('original,new_name,width,height,format,exif_removed,gps_present_before\n');
  });
});

describe('reportRecords', () => {
  it('should key rows by column name', () => {
    expect(reportRecords(rows.slice(0, 1))).toEqual([
      {
        original: 'a.jpg',
        new_name: 'img_1_.jpg',
        width: 10,
        height: 5,
        format: 'JPEG',
        exif_removed: true,
        gps_present_before: 'Yes',
      },
    ]);
  });
});

describe('formatReportTable', () => {
  it('should align columns', () => {
    expect(formatReportTable(rows).split('\n')).toEqual([
      'original            new_name    width  height  format  exif_removed  gps_present_before',
      '------------------  ----------  -----  ------  ------  ------------  ------------------',
      'a.jpg               img_1_.jpg  10     5       JPEG    true          Yes',
      'long_name_here.png  x.png       1200   800     PNG     false         No',
    ]);
  });
});
