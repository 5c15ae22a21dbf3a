import type { DrawInstruction, SceneDocument } from '@ridgeline/shared';
import { arcPath, gradientId, isFullCircle, paintFor, polygonPoints, stopOffset, toCssColor } from './sceneMarkup';

interface LandscapeSceneProps {
  scene: SceneDocument;
}

function Shape({ instruction, paint }: { instruction: DrawInstruction; paint: string }) {
  switch (instruction.shape) {
    case 'rect': {
      const { x, y, width, height } = instruction.rect;
      return <rect x={x} y={y} width={width} height={height} fill={paint} />;
    }
    case 'polygon':
      return <polygon points={polygonPoints(instruction.points)} fill={paint} />;
    case 'arc': {
      const { arc } = instruction;
      if (isFullCircle(arc)) {
        return <circle cx={arc.center.x} cy={arc.center.y} r={arc.radius} fill={paint} />;
      }
      return <path d={arcPath(arc)} fill={paint} />;
    }
  }
}

/** Draws a scene document as inline SVG, scaled to cover its container */
export function LandscapeScene({ scene }: LandscapeSceneProps) {
  return (
    <svg
      className="landscape"
      viewBox={`0 0 ${scene.width} ${scene.height}`}
      preserveAspectRatio="xMidYMid slice"
      role="img"
      aria-label={`Landscape ${scene.seed}`}
    >
      <defs>
        {scene.instructions.map((instruction, i) => {
          const { fill } = instruction;
          if (fill.kind !== 'linear') return null;
          const id = gradientId(scene.seed, i);
          return (
            <linearGradient
              key={id}
              id={id}
              gradientUnits="userSpaceOnUse"
              x1={fill.from.x} y1={fill.from.y} x2={fill.to.x} y2={fill.to.y}
            >
              {fill.stops.map((stop, j) => (
                <stop key={j} offset={stopOffset(stop.offset)} stopColor={toCssColor(stop.color)} />
              ))}
            </linearGradient>
          );
        })}
      </defs>

      {scene.instructions.map((instruction, i) => (
        <Shape
          key={`${instruction.layer}-${i}`}
          instruction={instruction}
          paint={paintFor(instruction.fill, gradientId(scene.seed, i))}
        />
      ))}
    </svg>
  );
}
