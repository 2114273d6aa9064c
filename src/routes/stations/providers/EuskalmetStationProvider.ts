import { RawPayload } from "../../../types";
import { InventoryStation, InventoryStationProvider, numberField, textField } from "../StationProvider";

export class EuskalmetStationProvider extends InventoryStationProvider {
	public readonly providerId = "EUSKALMET";
	public readonly providerName = "Euskalmet";
	protected readonly inventoryFile = "euskalmet.json";

	protected toStation( entry: RawPayload ): InventoryStation {
		const stationId = textField( entry, "stationId" );
		return {
			stationId,
			name: textField( entry, "displayName" ) || stationId,
			lat: numberField( entry, "lat" ),
			lon: numberField( entry, "lon" ),
			elevation: numberField( entry, "altitude_m" )
		};
	}
}
