import React, { useEffect, useRef } from 'react';
import type { DischargePoint } from '../types';

interface Props {
  data: DischargePoint[];
  title: string;
  xLabel: string;
  yLabel: string;
  color: string;
  marker?: DischargePoint; // Probe point
}

const DischargeChart: React.FC<Props> = ({ data, title, xLabel, yLabel, color, marker }) => {
  const canvasRef = useRef<HTMLCanvasElement>(null);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas || data.length === 0) return;
    const ctx = canvas.getContext('2d');
    if (!ctx) return;

    const w = canvas.width;
    const h = canvas.height;
    ctx.clearRect(0, 0, w, h);

    const PADDING_L = 60;
    const PADDING_R = 20;
    const PADDING_T = 40;
    const PADDING_B = 40;
    const DRAW_W = w - PADDING_L - PADDING_R;
    const DRAW_H = h - PADDING_T - PADDING_B;

    // Both axes start at zero so the H^1.5 shape reads from the origin
    const maxH = Math.max(...data.map(d => d.head));
    const maxQ = Math.max(...data.map(d => d.discharge)) * 1.1;

    const rangeH = maxH || 1;
    const rangeQ = maxQ || 1;

    const toX = (head: number) => PADDING_L + (head / rangeH) * DRAW_W;
    const toY = (q: number) => PADDING_T + DRAW_H - (q / rangeQ) * DRAW_H;

    // Grid
    ctx.strokeStyle = '#e2e8f0';
    ctx.lineWidth = 1;
    ctx.beginPath();
    ctx.fillStyle = '#64748b';
    ctx.font = '10px sans-serif';

    for (let i = 0; i <= 5; i++) {
      const x = PADDING_L + (DRAW_W * i) / 5;
      ctx.moveTo(x, PADDING_T);
      ctx.lineTo(x, h - PADDING_B);
      ctx.textAlign = 'center';
      ctx.fillText(((rangeH * i) / 5).toFixed(2), x, h - PADDING_B + 15);
    }

    for (let i = 0; i <= 5; i++) {
      const y = PADDING_T + (DRAW_H * i) / 5;
      ctx.moveTo(PADDING_L, y);
      ctx.lineTo(w - PADDING_R, y);
      ctx.textAlign = 'right';
      ctx.fillText((rangeQ - (rangeQ * i) / 5).toFixed(2), PADDING_L - 8, y + 3);
    }
    ctx.stroke();

    // Title & axis labels
    ctx.fillStyle = '#1e293b';
    ctx.font = 'bold 14px sans-serif';
    ctx.textAlign = 'center';
    ctx.fillText(title, w / 2 + PADDING_L / 2, 22);

    ctx.fillStyle = '#475569';
    ctx.font = 'bold 12px sans-serif';
    ctx.fillText(xLabel, w / 2 + PADDING_L / 2, h - 5);

    ctx.save();
    ctx.translate(15, h / 2);
    ctx.rotate(-Math.PI / 2);
    ctx.fillText(yLabel, 0, 0);
    ctx.restore();

    // Curve
    ctx.beginPath();
    ctx.strokeStyle = color;
    ctx.lineWidth = 3;
    ctx.lineJoin = 'round';
    ctx.moveTo(toX(data[0].head), toY(data[0].discharge));
    for (let i = 1; i < data.length; i++) {
      ctx.lineTo(toX(data[i].head), toY(data[i].discharge));
    }
    ctx.stroke();

    ctx.fillStyle = color + '20';
    ctx.lineTo(toX(data[data.length - 1].head), toY(0));
    ctx.lineTo(toX(data[0].head), toY(0));
    ctx.closePath();
    ctx.fill();

    if (marker) {
      const mx = toX(marker.head);
      const my = toY(marker.discharge);

      ctx.strokeStyle = '#94a3b8';
      ctx.lineWidth = 1;
      ctx.setLineDash([4, 4]);
      ctx.beginPath();
      ctx.moveTo(mx, toY(0));
      ctx.lineTo(mx, my);
      ctx.lineTo(PADDING_L, my);
      ctx.stroke();
      ctx.setLineDash([]);

      ctx.fillStyle = '#ffffff';
      ctx.strokeStyle = color;
      ctx.lineWidth = 2;
      ctx.beginPath();
      ctx.arc(mx, my, 5, 0, Math.PI * 2);
      ctx.fill();
      ctx.stroke();
    }

  }, [data, title, xLabel, yLabel, color, marker]);

  return (
    <div className="w-full h-full min-h-[300px] bg-white rounded-lg">
      <canvas
        ref={canvasRef}
        width={800}
        height={400}
        aria-label={title}
        className="w-full h-full object-contain"
      />
    </div>
  );
};

export default DischargeChart;
