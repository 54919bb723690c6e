import React, { useEffect, useRef } from 'react';

interface Props {
  head: number; // H above the crest
  criticalDepth: number; // yc at the downstream end of the crest
  maxHeadBound: number; // Upper slider bound, fixes the drawing scale
  unitLabel: string;
}

const WeirVisualizer: React.FC<Props> = ({ head, criticalDepth, maxHeadBound, unitLabel }) => {
  const canvasRef = useRef<HTMLCanvasElement>(null);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;
    const ctx = canvas.getContext('2d');
    if (!ctx) return;

    const w = canvas.width;
    const h = canvas.height;
    ctx.clearRect(0, 0, w, h);

    const PADDING = 30;
    const DRAW_W = w - PADDING * 2;
    const DRAW_H = h - PADDING * 2;

    // Weir proportions are tied to the slider bound, not the current head,
    // so the water level visibly moves as H changes
    const ref = maxHeadBound > 0 ? maxHeadBound : 1;
    const crestHeight = ref;
    const crestLength = 2 * ref;
    const upstream = 1.5 * ref;
    const downstream = 1.5 * ref;
    const tailwater = 0.25 * crestHeight;

    const geomW = upstream + crestLength + downstream;
    const geomH = crestHeight + ref * 1.2;

    const scale = Math.min(DRAW_W / geomW, DRAW_H / geomH);

    // World origin: channel bed at the upstream face of the weir
    const worldCenterX = (crestLength + downstream - upstream) / 2;
    const worldCenterY = geomH / 2;

    const toCanvas = (x: number, y: number) => ({
      x: w / 2 + (x - worldCenterX) * scale,
      y: h / 2 - (y - worldCenterY) * scale
    });

    const H = Math.max(0, Math.min(head, ref * 1.2));
    const yc = Math.max(0, Math.min(criticalDepth, H));

    // Water
    if (H > 0) {
      const pts = [
        toCanvas(-upstream, 0),
        toCanvas(-upstream, crestHeight + H),
        toCanvas(0, crestHeight + H),
        toCanvas(crestLength, crestHeight + yc),
        toCanvas(crestLength + downstream * 0.4, tailwater),
        toCanvas(crestLength + downstream, tailwater),
        toCanvas(crestLength + downstream, 0),
      ];
      ctx.fillStyle = 'rgba(14, 165, 233, 0.3)';
      ctx.beginPath();
      ctx.moveTo(pts[0].x, pts[0].y);
      pts.slice(1).forEach(p => ctx.lineTo(p.x, p.y));
      ctx.closePath();
      ctx.fill();

      ctx.strokeStyle = '#0ea5e9';
      ctx.lineWidth = 2;
      ctx.beginPath();
      ctx.moveTo(pts[1].x, pts[1].y);
      for (let i = 2; i <= 5; i++) ctx.lineTo(pts[i].x, pts[i].y);
      ctx.stroke();
    }

    // Weir block
    const b1 = toCanvas(0, 0);
    const b2 = toCanvas(crestLength, crestHeight);
    ctx.fillStyle = '#cbd5e1';
    ctx.fillRect(b1.x, b2.y, b2.x - b1.x, b1.y - b2.y);
    ctx.strokeStyle = '#334155';
    ctx.lineWidth = 3;
    ctx.lineJoin = 'round';
    ctx.strokeRect(b1.x, b2.y, b2.x - b1.x, b1.y - b2.y);

    // Bed
    const bedL = toCanvas(-upstream, 0);
    const bedR = toCanvas(crestLength + downstream, 0);
    ctx.beginPath();
    ctx.moveTo(bedL.x, bedL.y);
    ctx.lineTo(bedR.x, bedR.y);
    ctx.stroke();

    if (H > 0) {
      // Crest datum
      const c1 = toCanvas(-upstream, crestHeight);
      ctx.strokeStyle = '#94a3b8';
      ctx.lineWidth = 1;
      ctx.setLineDash([5, 5]);
      ctx.beginPath();
      ctx.moveTo(c1.x, c1.y);
      ctx.lineTo(b1.x, c1.y);
      ctx.stroke();
      ctx.setLineDash([]);

      // Head dimension
      const dimTop = toCanvas(-upstream / 2, crestHeight + H);
      const dimBot = toCanvas(-upstream / 2, crestHeight);
      ctx.strokeStyle = '#0369a1';
      ctx.beginPath();
      ctx.moveTo(dimTop.x, dimTop.y);
      ctx.lineTo(dimBot.x, dimBot.y);
      ctx.stroke();

      ctx.fillStyle = '#0369a1';
      ctx.font = 'bold 12px sans-serif';
      ctx.textAlign = 'left';
      ctx.fillText(`H = ${head.toFixed(3)} ${unitLabel}`, dimTop.x + 6, (dimTop.y + dimBot.y) / 2);

      const ycLabel = toCanvas(crestLength, crestHeight + yc);
      ctx.textAlign = 'right';
      ctx.fillText(`yc = ${criticalDepth.toFixed(3)} ${unitLabel}`, ycLabel.x - 4, ycLabel.y - 6);
    }

  }, [head, criticalDepth, maxHeadBound, unitLabel]);

  return (
    <div className="w-full h-full flex items-center justify-center rounded-lg relative">
      <canvas
        ref={canvasRef}
        width={800}
        height={400}
        className="w-full h-full object-contain"
      />
    </div>
  );
};

export default WeirVisualizer;
