import * as React from "react";
import Box from "@mui/material/Box";
import Slider from "@mui/material/Slider";
import Stack from "@mui/material/Stack";
import { CONTAINER, PANEL, POINTER } from "../CONFIG";
import {
  ChannelSelect,
  ColormapSelect,
  ImageHeader,
  IsolineToggle,
  LevelReadout,
  NoticeLine,
  StatusLine,
  ZoomIndicator,
  channelIndex,
  type ChannelChoice,
} from "../components";
import {
  CHANNEL_COLORS,
  HISTOGRAM_PADDING,
  canvasPoint,
  canvasToDisplay,
  colormapGradient,
  colors,
  createThrottledSender,
  drawFrame,
  drawHistogram,
  drawIsoline,
  fitScale,
  formatSignificant,
  frameToCanvas,
  panelYToValue,
  prepareHiDPI,
  usePreventScroll,
  useViewerConnection,
  useZoomPan,
  valueToPanelY,
  type ColormapName,
  type LevelRange,
  type ViewTransform,
  type ViewerSnapshot,
  type ZoomPanState,
} from "../core";

// ============================================================================
// Level histogram with range slider and isoline
// ============================================================================
interface LevelHistogramProps {
  snapshot: ViewerSnapshot;
  level: LevelRange;
  isoline: number;
  showIsoline: boolean;
  width: number;
  height: number;
  onLevelChange: (lo: number, hi: number) => void;
  onLevelCommit: (lo: number, hi: number) => void;
  onIsolineChange: (value: number) => void;
  onIsolineCommit: (value: number) => void;
}

function LevelHistogram({
  snapshot,
  level,
  isoline,
  showIsoline,
  width,
  height,
  onLevelChange,
  onLevelCommit,
  onIsolineChange,
  onIsolineCommit,
}: LevelHistogramProps) {
  const canvasRef = React.useRef<HTMLCanvasElement>(null);
  const [draggingIsoline, setDraggingIsoline] = React.useState(false);
  const { histogram } = snapshot;
  const { min, max } = histogram;

  // Draw histogram, level window and isoline
  React.useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;
    const ctx = prepareHiDPI(canvas, width, height);
    if (!ctx) return;

    const channelColors = histogram.channels.length === 1 ? [colors.barActive] : CHANNEL_COLORS;
    drawHistogram(ctx, histogram, level, width, height, { channelColors, displayBins: PANEL.HISTOGRAM.DISPLAY_BINS });
    if (showIsoline) {
      const y = Math.max(0, Math.min(height, valueToPanelY(isoline, min, max, height)));
      drawIsoline(ctx, y, width, draggingIsoline);
    }
  }, [histogram, level, isoline, showIsoline, draggingIsoline, width, height, min, max]);

  const handleMouseDown = (e: React.MouseEvent) => {
    const canvas = canvasRef.current;
    if (!canvas || !showIsoline) return;
    const { y } = canvasPoint(canvas, e.clientX, e.clientY);
    const lineY = valueToPanelY(isoline, min, max, height);
    if (Math.abs(y - lineY) <= PANEL.HISTOGRAM.ISOLINE_GRAB) {
      e.preventDefault();
      setDraggingIsoline(true);
    }
  };

  // Drag continues outside the canvas until the button is released
  React.useEffect(() => {
    if (!draggingIsoline) return;
    const canvas = canvasRef.current;
    if (!canvas) return;

    let last: number | null = null;
    const handleMove = (e: MouseEvent) => {
      const { y } = canvasPoint(canvas, e.clientX, e.clientY);
      last = panelYToValue(y, min, max, height);
      onIsolineChange(last);
    };
    const handleUp = () => {
      if (last !== null) onIsolineCommit(last);
      setDraggingIsoline(false);
    };

    document.addEventListener("mousemove", handleMove);
    document.addEventListener("mouseup", handleUp);
    return () => {
      document.removeEventListener("mousemove", handleMove);
      document.removeEventListener("mouseup", handleUp);
    };
  }, [draggingIsoline, min, max, height, onIsolineChange, onIsolineCommit]);

  const span = max - min;
  const step = span > 0 ? span / 1000 : 1;
  const readSlider = (v: number | number[]): [number, number] | null =>
    Array.isArray(v) && v.length === 2 ? [v[0], v[1]] : null;

  return (
    <Stack direction="row" spacing={0.5}>
      <canvas
        ref={canvasRef}
        className="viewer-canvas"
        onMouseDown={handleMouseDown}
        style={{ width, height, border: `1px solid ${colors.border}`, cursor: draggingIsoline ? "ns-resize" : "default" }}
      />
      <Slider
        orientation="vertical"
        value={[level.lo, level.hi]}
        onChange={(_, v) => {
          const pair = readSlider(v);
          if (pair) onLevelChange(pair[0], pair[1]);
        }}
        onChangeCommitted={(_, v) => {
          const pair = readSlider(v);
          if (pair) onLevelCommit(pair[0], pair[1]);
        }}
        min={min}
        max={max}
        step={step}
        disabled={!(span > 0)}
        size="small"
        valueLabelDisplay="auto"
        valueLabelFormat={(v) => formatSignificant(v)}
        sx={{
          height: height - 2 * HISTOGRAM_PADDING,
          my: `${HISTOGRAM_PADDING}px`,
          "& .MuiSlider-thumb": { width: 8, height: 8 },
          "& .MuiSlider-rail": { width: 2 },
          "& .MuiSlider-track": { width: 2 },
          "& .MuiSlider-valueLabel": { fontSize: 10, padding: "2px 4px" },
        }}
      />
      {snapshot.channelCount === 1 && (
        <Box
          sx={{
            width: PANEL.COLORBAR.WIDTH,
            height: height - 2 * HISTOGRAM_PADDING,
            my: `${HISTOGRAM_PADDING}px`,
            background: colormapGradient(snapshot.colormap),
            border: `1px solid ${colors.border}`,
          }}
        />
      )}
    </Stack>
  );
}

// ============================================================================
// Main Component
// ============================================================================
interface ImViewProps {
  socketUrl: string;
}

function centeredView(width: number, height: number, canvasWidth: number, canvasHeight: number): ZoomPanState {
  const scale = fitScale({ width, height }, canvasWidth, canvasHeight);
  return {
    zoom: 1,
    panX: (canvasWidth - width * scale) / 2,
    panY: (canvasHeight - height * scale) / 2,
  };
}

export function ImView({ socketUrl }: ImViewProps) {
  const { connected, snapshot, frame, status, isoline, notice, send, dismissNotice } = useViewerConnection(socketUrl);

  const canvasRef = React.useRef<HTMLCanvasElement>(null);
  const canvasWidth = PANEL.MAIN.WIDTH;
  const canvasHeight = PANEL.MAIN.HEIGHT;

  const imageWidth = snapshot?.width ?? 1;
  const imageHeight = snapshot?.height ?? 1;

  // ─────────────────────────────────────────────────────────────────────────
  // Zoom / pan
  // ─────────────────────────────────────────────────────────────────────────
  const initialView = React.useMemo(
    () => centeredView(imageWidth, imageHeight, canvasWidth, canvasHeight),
    [imageWidth, imageHeight, canvasWidth, canvasHeight],
  );
  const zoomPan = useZoomPan({ canvasRef, initialState: initialView });
  const { reset: resetView } = zoomPan;

  // Re-center when the image changes shape
  React.useEffect(() => {
    resetView();
  }, [imageWidth, imageHeight, resetView]);

  const scrollRefs = React.useMemo(() => [canvasRef], []);
  usePreventScroll(scrollRefs);

  const view: ViewTransform = React.useMemo(
    () => ({ ...zoomPan.state, scale: fitScale({ width: imageWidth, height: imageHeight }, canvasWidth, canvasHeight) }),
    [zoomPan.state, imageWidth, imageHeight, canvasWidth, canvasHeight],
  );

  // ─────────────────────────────────────────────────────────────────────────
  // Frame rendering
  // ─────────────────────────────────────────────────────────────────────────
  const source = React.useMemo(() => (frame ? frameToCanvas(frame) : null), [frame]);

  React.useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;
    const ctx = prepareHiDPI(canvas, canvasWidth, canvasHeight);
    if (!ctx) return;
    if (!source) {
      ctx.fillStyle = colors.bgCanvas;
      ctx.fillRect(0, 0, canvasWidth, canvasHeight);
      return;
    }
    drawFrame(ctx, source, canvasWidth, canvasHeight, view);
  }, [source, view, canvasWidth, canvasHeight]);

  React.useEffect(() => {
    if (snapshot) document.title = snapshot.title;
  }, [snapshot]);

  // ─────────────────────────────────────────────────────────────────────────
  // Outgoing messages
  // ─────────────────────────────────────────────────────────────────────────
  const sender = React.useMemo(() => createThrottledSender(send, POINTER.THROTTLE_MS), [send]);
  React.useEffect(() => () => sender.cancelAll(), [sender]);

  const exitImage = React.useCallback(() => {
    sender.cancel("pointer/move");
    send({ topic: "pointer/exit" });
  }, [send, sender]);

  const handleCanvasMove = (e: React.MouseEvent) => {
    zoomPan.handleMouseMove(e);
    const canvas = canvasRef.current;
    if (!canvas || !snapshot) return;
    const point = canvasPoint(canvas, e.clientX, e.clientY);
    const pos = canvasToDisplay(point.x, point.y, view, snapshot.height);
    const inside = pos.x >= 0 && pos.x < snapshot.width && pos.y >= 0 && pos.y < snapshot.height;
    if (inside) {
      sender.send({ topic: "pointer/move", payload: pos });
    } else if (status !== "") {
      exitImage();
    }
  };

  const handleCanvasLeave = () => {
    zoomPan.handleMouseUp();
    exitImage();
  };

  // ─────────────────────────────────────────────────────────────────────────
  // Levels and isoline
  // ─────────────────────────────────────────────────────────────────────────
  const [channelChoice, setChannelChoice] = React.useState<ChannelChoice>("All");
  const [dragLevel, setDragLevel] = React.useState<LevelRange | null>(null);
  const [localIsoline, setLocalIsoline] = React.useState<number | null>(null);
  const [showIsoline, setShowIsoline] = React.useState(true);

  const channel = snapshot && snapshot.channelCount > 1 ? channelIndex(channelChoice) : undefined;
  const shownLevel: LevelRange | undefined = dragLevel ?? snapshot?.levels[channel ?? 0];

  const handleLevelChange = (lo: number, hi: number) => {
    setDragLevel({ lo, hi });
    sender.send({ topic: "levels/set", payload: channel === undefined ? { lo, hi } : { lo, hi, channel } });
  };

  const handleLevelCommit = (lo: number, hi: number) => {
    sender.cancel("levels/set");
    send({ topic: "levels/set", payload: channel === undefined ? { lo, hi } : { lo, hi, channel } });
    setDragLevel(null);
  };

  const handleIsolineChange = React.useCallback((value: number) => {
    setLocalIsoline(value);
    sender.send({ topic: "isoline/set", payload: { value } });
  }, [sender]);

  // The final drag position always reaches the host
  const handleIsolineCommit = React.useCallback((value: number) => {
    setLocalIsoline(value);
    sender.cancel("isoline/set");
    send({ topic: "isoline/set", payload: { value } });
  }, [send, sender]);

  // The host's echo replaces the local drag value
  React.useEffect(() => {
    setLocalIsoline(null);
  }, [isoline]);

  const shownIsoline = localIsoline ?? isoline ?? 0;

  const handleColormap = (name: ColormapName) => send({ topic: "colormap/set", payload: { name } });
  const handleReset = () => {
    setDragLevel(null);
    send({ topic: "levels/reset" });
  };

  // ─────────────────────────────────────────────────────────────────────────
  // Render
  // ─────────────────────────────────────────────────────────────────────────
  return (
    <Box sx={{ ...CONTAINER.ROOT }}>
      <ImageHeader snapshot={snapshot} connected={connected} />

      <Stack direction="row" spacing={1}>
        <Box sx={{ ...CONTAINER.IMAGE_BOX, width: canvasWidth, height: canvasHeight }}>
          <canvas
            ref={canvasRef}
            className="viewer-canvas viewer-canvas-pan"
            style={{ width: canvasWidth, height: canvasHeight }}
            onWheel={zoomPan.handleWheel}
            onMouseDown={zoomPan.handleMouseDown}
            onMouseMove={handleCanvasMove}
            onMouseUp={zoomPan.handleMouseUp}
            onMouseLeave={handleCanvasLeave}
            onDoubleClick={zoomPan.handleDoubleClick}
          />
          <ZoomIndicator zoom={zoomPan.state.zoom} />
        </Box>

        {snapshot && shownLevel && (
          <LevelHistogram
            snapshot={snapshot}
            level={shownLevel}
            isoline={shownIsoline}
            showIsoline={showIsoline}
            width={PANEL.HISTOGRAM.WIDTH}
            height={canvasHeight}
            onLevelChange={handleLevelChange}
            onLevelCommit={handleLevelCommit}
            onIsolineChange={handleIsolineChange}
            onIsolineCommit={handleIsolineCommit}
          />
        )}
      </Stack>

      <StatusLine text={status} />

      {snapshot && (
        <Stack direction="row" spacing={1} alignItems="center" sx={{ mt: 1 }}>
          {snapshot.channelCount === 1 ? (
            <ColormapSelect value={snapshot.colormap} onChange={handleColormap} />
          ) : (
            <ChannelSelect value={channelChoice} onChange={setChannelChoice} />
          )}
          <LevelReadout level={shownLevel} pinned={snapshot.pinned} onReset={handleReset} />
          <IsolineToggle visible={showIsoline} value={shownIsoline} onToggle={setShowIsoline} />
        </Stack>
      )}

      {notice && <NoticeLine notice={notice} onDismiss={dismissNotice} />}
    </Box>
  );
}
