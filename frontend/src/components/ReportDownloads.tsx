import type { ReportFormat } from '../types/news';
import { downloadHref, downloadName } from '../lib/stats';

const LABELS:Record<ReportFormat,string> = { text:'Text', markdown:'Markdown', html:'HTML' };
const ORDER:ReportFormat[] = ['markdown','html','text'];

export default function ReportDownloads({rendered, generatedAt}:{rendered:Record<ReportFormat,string>; generatedAt:string}) {
  return (
    <div style={{display:'flex', gap:12, fontSize:14, marginBottom:16}}>
      Download:
      {ORDER.map(f=>(
        <a key={f} href={downloadHref(rendered[f], f)} download={downloadName(generatedAt, f)} style={{color:'#2563eb'}}>{LABELS[f]}</a>
      ))}
    </div>
  );
}
